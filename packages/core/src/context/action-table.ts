import { Logger, Telemetry, type EngineLogger } from "sdui-kernel";
import { UnregisteredBindingWarning, ensureError } from "sdui-shared";
import type { DomainRecord } from "./render-context";

export type ActionHandler<R extends DomainRecord> = (record?: R) => void;

/**
 * Moves the rows at `from` (indices into the rendered record order) so they
 * land before index `to`. The handler owns the domain order; the schema is
 * never touched.
 */
export type ReorderHandler = (from: readonly number[], to: number) => void;

export interface ActionTableOptions {
  /** Log triggers of unregistered names at debug level (default: true) */
  logUnregistered?: boolean;
  logger?: EngineLogger;
}

/**
 * Name-to-callback registry invoked by interactive nodes.
 *
 * Lookups happen when a control is triggered, not when it is rendered, so a
 * handler registered after the first render still fires. Triggering a name
 * nobody registered does nothing: schemas and app binaries ship separately,
 * and a newer schema may reference actions an older app lacks.
 */
export class ActionTable<R extends DomainRecord = DomainRecord> {
  private handlers = new Map<string, ActionHandler<R>>();
  private reorderHandler: ReorderHandler | undefined;
  private readonly logUnregistered: boolean;
  private readonly logger: EngineLogger | undefined;

  constructor(options: ActionTableOptions = {}) {
    this.logUnregistered = options.logUnregistered ?? true;
    this.logger = options.logger;
  }

  private get log(): EngineLogger {
    return this.logger ?? Logger.for("ActionTable");
  }

  register(name: string, handler: ActionHandler<R>): this {
    if (this.handlers.has(name)) {
      this.log.warn({ action: name }, "Overwriting action handler");
    }
    this.handlers.set(name, handler);
    return this;
  }

  unregister(name: string): boolean {
    return this.handlers.delete(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  names(): string[] {
    return Array.from(this.handlers.keys());
  }

  clear(): void {
    this.handlers.clear();
    this.reorderHandler = undefined;
  }

  /**
   * Run the handler registered under `name`. Returns whether one ran.
   * Handler exceptions are logged and recorded, never rethrown into the UI.
   */
  invoke(name: string | undefined, record?: R): boolean {
    if (name === undefined) {
      return false;
    }
    const handler = this.handlers.get(name);
    if (!handler) {
      this.reportUnregistered(name);
      return false;
    }
    try {
      handler(record);
    } catch (error) {
      const err = ensureError(error);
      this.log.error({ err, action: name, recordId: record?.id }, "Action handler failed");
      Telemetry.recordError(err);
    }
    return true;
  }

  onReorder(handler: ReorderHandler | undefined): this {
    this.reorderHandler = handler;
    return this;
  }

  get canReorder(): boolean {
    return this.reorderHandler !== undefined;
  }

  reorder(from: readonly number[], to: number): boolean {
    if (!this.reorderHandler) {
      this.reportUnregistered("reorder");
      return false;
    }
    try {
      this.reorderHandler(from, to);
    } catch (error) {
      const err = ensureError(error);
      this.log.error({ err, from, to }, "Reorder handler failed");
      Telemetry.recordError(err);
    }
    return true;
  }

  private reportUnregistered(name: string): void {
    Telemetry.getCounter("sdui.actions.unregistered", "count", "Unregistered actions triggered").add(
      1,
      { action: name },
    );
    if (this.logUnregistered) {
      const warning = new UnregisteredBindingWarning("action", name);
      this.log.debug({ code: warning.code, action: name }, warning.message);
    }
  }
}

/**
 * Move the items at `from` to before index `to`, keeping their relative order.
 * Indices follow the list-move convention: `to` counts positions in the
 * original array, so moving one item down by one is `moveItems(xs, [i], i + 2)`.
 */
export function moveItems<T>(items: readonly T[], from: readonly number[], to: number): T[] {
  const picked = new Set(from.filter((index) => index >= 0 && index < items.length));
  const moving = items.filter((_, index) => picked.has(index));
  const staying: T[] = [];
  let insertAt = 0;
  items.forEach((item, index) => {
    if (index < to && !picked.has(index)) {
      insertAt++;
    }
    if (!picked.has(index)) {
      staying.push(item);
    }
  });
  staying.splice(insertAt, 0, ...moving);
  return staying;
}
