/**
 * Screen renderer
 *
 * The recursive core of the engine. For each node:
 *
 *   validate → (cache lookup) → dispatch on type → style → motion → (cache store)
 *
 * Every failure below the screen is contained at the node that caused it and
 * drawn as an inline error view; siblings and ancestors render normally. An
 * unsupported schema version is the one screen-level failure and replaces the
 * whole render with a single fallback view. `render()` never throws.
 */

import {
  RenderError,
  ensureError,
  isCompositeType,
  isInputType,
  isWidgetType,
  type ComponentNode,
  type Screen,
} from "sdui-shared";
import { Logger, RenderScope, Telemetry, type EngineLogger } from "sdui-kernel";
import { parseRendererConfig, type RendererConfig, type RendererConfigInput, type RendererHooks } from "../config";
import { bind, bindingKey } from "../context/binding-store";
import { withCurrentRecord, type DomainRecord, type RenderContext } from "../context/render-context";
import { resolveLabel, resolveRecordValue, resolveText } from "../resolvers/data";
import { StyleResolver, isTransparent } from "../resolvers/style";
import { applyMotion } from "../resolvers/animation";
import { toValidationError, validateComponent } from "../validation/validate";
import { createErrorView } from "../validation/error-view";
import { VersionManager } from "../validation/version";
import { computeSignature } from "../cache/signature";
import type { ComponentCache } from "../cache/component-cache";
import { buildInputElement } from "./inputs";
import type { ImageSource, ViewFactory } from "./elements";

export interface ScreenRendererOptions<V, R extends DomainRecord> extends RendererHooks {
  factory: ViewFactory<V>;
  /** Memoises composite subtrees when present */
  cache?: ComponentCache<V>;
  styles?: StyleResolver<R>;
  config?: RendererConfigInput;
}

export const DEFAULT_GRID_COLUMNS = 2;
export const DEFAULT_MAP_SPAN = 0.05;

function assertNever(value: never): never {
  throw new Error(`Unhandled component type: ${String(value)}`);
}

/**
 * Renders screens through a host view factory.
 *
 * @typeParam V - The host's view type
 * @typeParam R - The domain record type list rows render against
 *
 * @example
 * ```typescript
 * const renderer = new ScreenRenderer({ factory: new TreeViewFactory() });
 * const context = createRenderContext({ records: jobs, accessors });
 * const view = renderer.render(decodeScreen(json), context);
 * ```
 */
export class ScreenRenderer<V, R extends DomainRecord = DomainRecord> {
  readonly factory: ViewFactory<V>;
  readonly cache: ComponentCache<V> | undefined;
  readonly styles: StyleResolver<R>;
  readonly config: RendererConfig;
  readonly versions: VersionManager;
  private readonly now: () => Date;
  private readonly logger: EngineLogger | undefined;

  constructor(options: ScreenRendererOptions<V, R>) {
    this.factory = options.factory;
    this.cache = options.cache;
    this.styles = options.styles ?? new StyleResolver<R>({ logger: options.logger });
    this.config = parseRendererConfig(options.config);
    this.versions = new VersionManager(
      this.config.minSupportedVersion,
      this.config.maxSupportedVersion,
    );
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  private get log(): EngineLogger {
    return this.logger ?? Logger.for("ScreenRenderer");
  }

  /**
   * Render a whole screen. Runs inside a render scope so every log line it
   * produces carries the render id and screen id.
   */
  render(screen: Screen, context: RenderContext<R>): V {
    const scope = RenderScope.create({
      screenId: screen.component.id,
      screenVersion: screen.version,
    });
    return RenderScope.run(scope, () => {
      const attributes = {
        "sdui.screen.id": screen.component.id,
        "sdui.screen.version": screen.version,
      };
      return Telemetry.measure("sdui.render", attributes, () => {
        if (!this.versions.isVersionSupported(screen.version)) {
          return this.renderFallback(screen.version);
        }
        return this.renderComponent(screen.component, context, "root");
      });
    });
  }

  /**
   * Render one node and its subtree. `path` locates the node for cache
   * signatures; pass "root" for a screen's root.
   */
  renderComponent(node: ComponentNode, context: RenderContext<R>, path: string): V {
    const issue = validateComponent(node);
    if (issue) {
      const error = toValidationError(issue);
      this.log.warn(
        { code: error.code, nodeId: issue.nodeId, nodeType: issue.nodeType, field: issue.field },
        error.message,
      );
      this.countNodeError(node, error.code);
      return createErrorView(this.factory, issue.message, node);
    }

    try {
      if (!this.cache || !isCompositeType(node.type)) {
        return this.build(node, context, path);
      }
      const signature = computeSignature({
        path,
        node,
        context,
        scope: [this.factory, this.styles],
      });
      const cached = this.cache.get(signature);
      if (cached !== undefined) {
        return cached;
      }
      const view = this.build(node, context, path);
      this.cache.set(signature, view);
      return view;
    } catch (error) {
      const err = new RenderError(node.id, node.type, ensureError(error));
      this.log.error({ err, nodeId: node.id, nodeType: node.type }, "Node failed to render");
      Telemetry.recordError(err);
      this.countNodeError(node, err.code);
      return createErrorView(this.factory, err.message, node);
    }
  }

  private renderFallback(version: number): V {
    const error = this.versions.unsupported(version);
    this.log.warn(
      {
        code: error.code,
        version,
        compatibility: this.versions.compatibilityMode(version),
      },
      error.message,
    );
    Telemetry.getCounter("sdui.render.fallback", "count", "Screens replaced by fallback").add(1, {
      version,
    });
    return this.factory.create(this.versions.fallbackElement(version));
  }

  private countNodeError(node: ComponentNode, code: string): void {
    Telemetry.getCounter("sdui.render.node_errors", "count", "Nodes drawn as errors").add(1, {
      nodeType: node.type,
      code,
    });
  }

  private build(node: ComponentNode, context: RenderContext<R>, path: string): V {
    // A hidden conditional draws nothing, not even its own decorations.
    if (node.type === "conditional" && !resolveRecordValue(node.conditionKey, context)) {
      return this.factory.empty();
    }
    const record = context.currentRecord;
    const styled = this.styles.applyStyling(
      this.dispatch(node, context, path),
      node,
      record,
      this.factory,
    );
    return applyMotion(styled, node, this.factory);
  }

  private renderChildren(node: ComponentNode, context: RenderContext<R>, path: string): V[] {
    return (node.children ?? []).map((child, index) =>
      this.renderComponent(child, context, `${path}/${index}`),
    );
  }

  private renderRows(
    itemView: ComponentNode,
    context: RenderContext<R>,
    path: string,
  ): Array<{ recordId: string; view: V }> {
    return context.records.map((record, index) => ({
      recordId: record.id,
      view: this.renderComponent(itemView, withCurrentRecord(context, record), `${path}/item[${index}]`),
    }));
  }

  private labelFor(node: ComponentNode, context: RenderContext<R>): string {
    return node.text !== undefined ? resolveText(node, context) : resolveLabel(node, context);
  }

  /**
   * The single site that knows every component type.
   */
  private dispatch(node: ComponentNode, context: RenderContext<R>, path: string): V {
    const { factory } = this;
    const { type } = node;
    const record = context.currentRecord;
    const trigger = () => {
      context.actions.invoke(node.actionId, record ?? undefined);
    };

    if (isInputType(type)) {
      return factory.create(
        buildInputElement(type, node, {
          bindings: context.bindings,
          record,
          label: this.labelFor(node, context),
          now: this.now,
        }),
      );
    }

    if (isWidgetType(type)) {
      return factory.create({
        kind: "widget",
        nodeId: node.id,
        widget: type,
        props: node.extras,
        record,
        dispatch: (actionId) => {
          context.actions.invoke(actionId, record ?? undefined);
        },
      });
    }

    switch (type) {
      // Layout
      case "vstack":
      case "hstack":
        return factory.create({
          kind: "stack",
          nodeId: node.id,
          axis: type === "vstack" ? "vertical" : "horizontal",
          spacing: node.spacing,
          children: this.renderChildren(node, context, path),
        });

      case "scroll":
        return factory.create({
          kind: "scroll",
          nodeId: node.id,
          content: factory.create({
            kind: "stack",
            nodeId: node.id,
            axis: "vertical",
            spacing: node.spacing,
            children: this.renderChildren(node, context, path),
          }),
        });

      case "grid":
        return factory.create({
          kind: "grid",
          nodeId: node.id,
          columns: node.columns ?? DEFAULT_GRID_COLUMNS,
          spacing: node.spacing,
          children: this.renderChildren(node, context, path),
        });

      case "list": {
        const itemView = node.itemView;
        if (!itemView) {
          throw new Error(`List '${node.id}' has no itemView`);
        }
        return factory.create({
          kind: "list",
          nodeId: node.id,
          rows: this.renderRows(itemView, context, path),
          ...(node.reorderable !== false && {
            onMove: (from: readonly number[], to: number) => {
              context.actions.reorder(from, to);
            },
          }),
        });
      }

      case "tabView": {
        const children = node.children ?? [];
        const views = this.renderChildren(node, context, path);
        return factory.create({
          kind: "tabs",
          nodeId: node.id,
          tabs: children.map((child, index) => ({
            title: child.label ?? child.text ?? child.id,
            view: views[index] ?? factory.empty(),
          })),
          ...(node.valueKey
            ? { selection: bind(context.bindings, "int", bindingKey(node.valueKey, record), 0) }
            : {}),
        });
      }

      case "section":
        return factory.create({
          kind: "section",
          nodeId: node.id,
          header: node.title,
          footer: node.message,
          children: this.renderChildren(node, context, path),
        });

      // Content
      case "text":
        return factory.create({
          kind: "text",
          nodeId: node.id,
          text: resolveText(node, context),
          font: this.styles.resolveFont(node.font),
          weight: this.styles.resolveFontWeight(node.fontWeight),
          color: this.styles.resolveColor(node.foregroundColor ?? node.color, record),
        });

      case "button": {
        const background =
          node.backgroundColor === undefined
            ? undefined
            : this.styles.resolveColor(node.backgroundColor, record);
        return factory.create({
          kind: "button",
          nodeId: node.id,
          label: this.labelFor(node, context),
          ...(node.children?.length ? { content: this.renderChildren(node, context, path) } : {}),
          plain: background !== undefined && isTransparent(background),
          onPress: trigger,
        });
      }

      case "spacer":
        return factory.create({ kind: "spacer", nodeId: node.id });

      case "divider":
        return factory.create({ kind: "divider", nodeId: node.id });

      case "image": {
        let source: ImageSource;
        if (node.imageName) {
          source = { kind: "asset", name: node.imageName };
        } else if (node.url) {
          source = { kind: "remote", url: node.url };
        } else {
          throw new Error(`Image '${node.id}' has no source`);
        }
        return factory.create({ kind: "image", nodeId: node.id, source });
      }

      case "progressView": {
        const label = this.labelFor(node, context);
        return factory.create({
          kind: "progress",
          nodeId: node.id,
          ...(node.progress !== undefined && { value: node.progress }),
          ...(label ? { label } : {}),
        });
      }

      // Navigation and presentation
      case "navigationLink":
        return factory.create({
          kind: "navigationLink",
          nodeId: node.id,
          label: this.labelFor(node, context),
          destination: node.destination ?? "",
          ...(node.children?.length ? { content: this.renderChildren(node, context, path) } : {}),
          onNavigate: trigger,
        });

      case "alert":
      case "actionSheet":
        return factory.create({
          kind: type,
          nodeId: node.id,
          title: node.title ?? this.labelFor(node, context),
          message: node.message,
          isPresented: bind(
            context.bindings,
            "bool",
            bindingKey(node.isPresented ?? "", record),
            false,
          ),
          actions: this.renderChildren(node, context, path),
        });

      // Logic
      case "conditional": {
        return factory.create({
          kind: "stack",
          nodeId: node.id,
          axis: "vertical",
          spacing: node.spacing,
          children: this.renderChildren(node, context, path),
        });
      }

      case "forEach": {
        const itemView = node.itemView;
        if (!itemView) {
          throw new Error(`ForEach '${node.id}' has no itemView`);
        }
        return factory.create({
          kind: "stack",
          nodeId: node.id,
          axis: "vertical",
          spacing: node.spacing,
          children: this.renderRows(itemView, context, path).map((row) => row.view),
        });
      }

      // Advanced
      case "mapView":
        return factory.create({
          kind: "map",
          nodeId: node.id,
          center: { latitude: node.centerLatitude ?? 0, longitude: node.centerLongitude ?? 0 },
          span: node.span ?? DEFAULT_MAP_SPAN,
        });

      case "webView":
        return factory.create({ kind: "web", nodeId: node.id, url: node.webURL ?? node.url });

      case "chart":
        return factory.create({
          kind: "chart",
          nodeId: node.id,
          chartType: node.chartType ?? "bar",
          dataKey: node.dataKey,
          records: context.records,
        });

      case "gauge":
        return factory.create({
          kind: "gauge",
          nodeId: node.id,
          label: this.labelFor(node, context),
          value: node.progress ?? 0,
          min: node.gaugeMin ?? 0,
          max: node.gaugeMax ?? 1,
        });

      default:
        return assertNever(type);
    }
  }
}
