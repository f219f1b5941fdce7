/**
 * Style resolution and application
 *
 * Colour, font and weight tokens map onto a fixed vocabulary the view factory
 * understands. Decorations are always produced in the same order, whichever
 * attributes are present: padding, background, border, shadow, opacity,
 * rotation, scale.
 */

import { ensureError, type ComponentNode } from "sdui-shared";
import { Logger, type EngineLogger } from "sdui-kernel";
import type { DomainRecord } from "../context/render-context";
import type { Decoration, ViewFactory } from "../renderer/elements";

// =============================================================================
// Colours
// =============================================================================

export const NAMED_COLORS = [
  "primary",
  "secondary",
  "accent",
  "clear",
  "red",
  "blue",
  "green",
  "gray",
  "black",
  "white",
  "orange",
  "yellow",
  "purple",
  "pink",
  "cyan",
  "mint",
  "teal",
  "indigo",
  "brown",
] as const;

export type NamedColor = (typeof NAMED_COLORS)[number];

export type ResolvedColor =
  | { kind: "named"; name: NamedColor }
  | { kind: "rgba"; r: number; g: number; b: number; a: number };

const COLOR_ALIASES: Readonly<Record<string, NamedColor>> = {
  grey: "gray",
  transparent: "clear",
};

const PRIMARY: ResolvedColor = { kind: "named", name: "primary" };

const HEX_PATTERN = /^#([0-9a-f]{6}|[0-9a-f]{8})$/i;

function namedColor(token: string): NamedColor | undefined {
  const lower = token.toLowerCase();
  return NAMED_COLORS.find((name) => name === lower) ?? COLOR_ALIASES[lower];
}

function parseHex(token: string): ResolvedColor | undefined {
  const match = HEX_PATTERN.exec(token);
  const digits = match?.[1];
  if (digits === undefined) {
    return undefined;
  }
  const channel = (offset: number) => parseInt(digits.slice(offset, offset + 2), 16) / 255;
  return {
    kind: "rgba",
    r: channel(0),
    g: channel(2),
    b: channel(4),
    a: digits.length === 8 ? channel(6) : 1,
  };
}

/**
 * Resolve a literal colour token (named or hex). Anything else is `primary`.
 */
export function resolveLiteralColor(token: string): ResolvedColor {
  const name = namedColor(token);
  if (name) {
    return { kind: "named", name };
  }
  return parseHex(token) ?? PRIMARY;
}

export function isTransparent(color: ResolvedColor): boolean {
  return color.kind === "named" ? color.name === "clear" : color.a === 0;
}

/**
 * Maps a record's state to a colour token. Returning `undefined` falls back to
 * `primary`.
 */
export type SemanticColorRule<R extends DomainRecord> = (record: R) => string | undefined;

export type SemanticColorTable<R extends DomainRecord> = Readonly<
  Record<string, SemanticColorRule<R>>
>;

/**
 * Build a rule that reads an enum-like value from the record and looks it up
 * in `mapping`.
 */
export function statusColorRule<R extends DomainRecord>(
  read: (record: R) => string | undefined,
  mapping: Readonly<Record<string, string>>,
): SemanticColorRule<R> {
  return (record) => {
    const state = read(record);
    return state === undefined ? undefined : mapping[state];
  };
}

export const DEFAULT_STATUS_COLORS: Readonly<Record<string, string>> = {
  pending: "gray",
  inProgress: "blue",
  completed: "green",
  skipped: "orange",
};

function readStatus(record: DomainRecord): string | undefined {
  return "status" in record && typeof record.status === "string" ? record.status : undefined;
}

/**
 * `statusColor` reads a string `status` property from the record.
 */
export function defaultSemanticColors<R extends DomainRecord>(): SemanticColorTable<R> {
  return { statusColor: statusColorRule<R>(readStatus, DEFAULT_STATUS_COLORS) };
}

// =============================================================================
// Typography
// =============================================================================

export const FONT_STYLES = [
  "largeTitle",
  "title",
  "title2",
  "title3",
  "headline",
  "subheadline",
  "body",
  "callout",
  "footnote",
  "caption",
  "caption2",
] as const;

export type FontStyle = (typeof FONT_STYLES)[number];

/** Design-system names mapped onto the platform vocabulary */
const FONT_ALIASES: Readonly<Record<string, FontStyle>> = {
  display: "largeTitle",
  headlinelarge: "title",
  headlinemedium: "title2",
  headlinesmall: "title3",
  titlelarge: "title2",
  titlemedium: "headline",
  titlesmall: "subheadline",
  bodylarge: "body",
  bodymedium: "callout",
  bodysmall: "footnote",
  labelmedium: "caption",
  labelsmall: "caption2",
};

export function resolveFont(name: string | undefined): FontStyle {
  if (name === undefined) {
    return "body";
  }
  const lower = name.toLowerCase();
  return FONT_STYLES.find((style) => style.toLowerCase() === lower) ?? FONT_ALIASES[lower] ?? "body";
}

export const FONT_WEIGHTS = [
  "ultraLight",
  "thin",
  "light",
  "regular",
  "medium",
  "semibold",
  "bold",
  "heavy",
  "black",
] as const;

export type FontWeight = (typeof FONT_WEIGHTS)[number];

export function resolveFontWeight(name: string | undefined): FontWeight {
  if (name === undefined) {
    return "regular";
  }
  const lower = name.toLowerCase();
  return FONT_WEIGHTS.find((weight) => weight.toLowerCase() === lower) ?? "regular";
}

// =============================================================================
// Resolver
// =============================================================================

export interface StyleResolverOptions<R extends DomainRecord> {
  /** Extra semantic tokens; override the defaults of the same name */
  semanticColors?: SemanticColorTable<R>;
  logger?: EngineLogger;
}

/**
 * Resolves style tokens against a record. Holds the semantic colour table;
 * otherwise stateless.
 *
 * @example
 * ```typescript
 * const styles = new StyleResolver<Job>({
 *   semanticColors: {
 *     priorityColor: statusColorRule((job) => job.priority, { high: 'red', low: 'gray' }),
 *   },
 * });
 * styles.resolveColor('priorityColor', job);
 * ```
 */
export class StyleResolver<R extends DomainRecord = DomainRecord> {
  private readonly semanticColors: SemanticColorTable<R>;
  private readonly logger: EngineLogger | undefined;

  constructor(options: StyleResolverOptions<R> = {}) {
    this.semanticColors = { ...defaultSemanticColors<R>(), ...options.semanticColors };
    this.logger = options.logger;
  }

  private get log(): EngineLogger {
    return this.logger ?? Logger.for("StyleResolver");
  }

  isSemanticToken(token: string): boolean {
    return token in this.semanticColors;
  }

  /**
   * Absent → `primary`; semantic token → its rule's result, resolved as a
   * literal (`primary` without a record); named or hex literal; else `primary`.
   */
  resolveColor(token: string | undefined, record: R | null): ResolvedColor {
    if (token === undefined) {
      return PRIMARY;
    }
    const rule = this.semanticColors[token];
    if (!rule) {
      return resolveLiteralColor(token);
    }
    if (record === null) {
      return PRIMARY;
    }
    let resolved: string | undefined;
    try {
      resolved = rule(record);
    } catch (error) {
      this.log.warn(
        { err: ensureError(error), token, recordId: record.id },
        "Semantic colour rule threw",
      );
    }
    return resolved === undefined ? PRIMARY : resolveLiteralColor(resolved);
  }

  resolveFont(name: string | undefined): FontStyle {
    return resolveFont(name);
  }

  resolveFontWeight(name: string | undefined): FontWeight {
    return resolveFontWeight(name);
  }

  /**
   * Decorations for a node, in application order.
   */
  resolveDecorations(component: ComponentNode, record: R | null): Decoration[] {
    const decorations: Decoration[] = [];

    if (component.padding !== undefined) {
      decorations.push({ kind: "padding", amount: component.padding });
    }

    if (component.backgroundColor !== undefined) {
      const color = this.resolveColor(component.backgroundColor, record);
      if (!isTransparent(color)) {
        decorations.push({
          kind: "background",
          color,
          ...(component.cornerRadius !== undefined && { cornerRadius: component.cornerRadius }),
        });
      }
    }

    if (component.borderWidth !== undefined) {
      decorations.push({
        kind: "border",
        color: this.resolveColor(component.borderColor, record),
        width: component.borderWidth,
        ...(component.cornerRadius !== undefined && { cornerRadius: component.cornerRadius }),
      });
    }

    if (component.shadowRadius !== undefined) {
      decorations.push({
        kind: "shadow",
        color: this.resolveColor(component.shadowColor, record),
        radius: component.shadowRadius,
        offset: { x: component.shadowOffset?.x ?? 0, y: component.shadowOffset?.y ?? 2 },
      });
    }

    if (component.opacity !== undefined) {
      decorations.push({ kind: "opacity", value: component.opacity });
    }

    if (component.rotation !== undefined) {
      decorations.push({ kind: "rotation", degrees: component.rotation });
    }

    if (component.scale !== undefined) {
      decorations.push({ kind: "scale", factor: component.scale });
    }

    return decorations;
  }

  /**
   * Fold the node's decorations over `view`. The component is never modified.
   */
  applyStyling<V>(view: V, component: ComponentNode, record: R | null, factory: ViewFactory<V>): V {
    return this.resolveDecorations(component, record).reduce(
      (decorated, decoration) => factory.decorate(decorated, decoration),
      view,
    );
  }
}
