import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { ContextError } from "sdui-shared";

/**
 * Identity of one render pass. Established by the renderer around every
 * `render()` call so that log lines and telemetry emitted anywhere beneath it
 * can be correlated.
 *
 * Rendering is synchronous, so the scope is entered and left within a single
 * call stack; AsyncLocalStorage is used for the lookup, not for propagation
 * across awaits.
 */
export interface RenderScopeState {
  renderId: string;
  traceId: string;
  /** Id of the screen's root component */
  screenId?: string;
  screenVersion?: number;
  metadata: Record<string, unknown>;
}

const storage = new AsyncLocalStorage<RenderScopeState>();

export class RenderScope {
  /**
   * Creates a new scope object with defaults.
   */
  static create(overrides: Partial<RenderScopeState> = {}): RenderScopeState {
    return {
      renderId: overrides.renderId ?? randomUUID(),
      traceId: overrides.traceId ?? randomUUID(),
      screenId: overrides.screenId,
      screenVersion: overrides.screenVersion,
      metadata: overrides.metadata ?? {},
    };
  }

  /**
   * Runs a function within the given scope.
   */
  static run<T>(scope: RenderScopeState, fn: () => T): T {
    return storage.run(scope, fn);
  }

  /**
   * Creates a scope that inherits from the current one (or a new root).
   * `metadata` is shared with the parent.
   */
  static child(overrides: Partial<RenderScopeState> = {}): RenderScopeState {
    const parent = RenderScope.tryGet();
    if (!parent) {
      return RenderScope.create(overrides);
    }
    return { ...parent, ...overrides };
  }

  /**
   * Creates a child scope and runs a function within it.
   */
  static fork<T>(overrides: Partial<RenderScopeState>, fn: () => T): T {
    return RenderScope.run(RenderScope.child(overrides), fn);
  }

  /**
   * Gets the current scope. Throws if not found.
   */
  static get(): RenderScopeState {
    const store = storage.getStore();
    if (!store) {
      throw ContextError.notFound();
    }
    return store;
  }

  /**
   * Gets the current scope or returns undefined if not found.
   */
  static tryGet(): RenderScopeState | undefined {
    return storage.getStore();
  }
}
