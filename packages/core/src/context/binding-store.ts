import { EventEmitter } from "node:events";
import type { DomainRecord } from "./render-context";

/**
 * Identifies one piece of per-field state. `scope` is the owning record's id,
 * or `"global"` when the field is not bound to a record.
 */
export interface BindingKey {
  readonly field: string;
  readonly scope: string;
}

export const GLOBAL_SCOPE = "global";

/**
 * The only way binding keys are built.
 */
export function bindingKey(field: string, record?: DomainRecord | null): BindingKey {
  return { field, scope: record?.id ?? GLOBAL_SCOPE };
}

/**
 * Unambiguous string form of a key for logs and cache signatures. Field and
 * scope are JSON-encoded, so no delimiter inside either can collide.
 */
export function formatBindingKey(key: BindingKey): string {
  return JSON.stringify([key.field, key.scope]);
}

/**
 * Value type stored for each binding kind.
 */
export interface BindingValueMap {
  text: string;
  bool: boolean;
  double: number;
  int: number;
  date: Date;
  selection: string;
  selections: readonly string[];
}

export type BindingValueKind = keyof BindingValueMap;

export const BINDING_VALUE_KINDS: readonly BindingValueKind[] = [
  "text",
  "bool",
  "double",
  "int",
  "date",
  "selection",
  "selections",
];

/**
 * Event payload types for BindingStore events
 */
export interface BindingStoreEventMap {
  "binding:changed": [
    kind: BindingValueKind,
    key: BindingKey,
    value: unknown,
    previousValue: unknown,
  ];
  "binding:deleted": [kind: BindingValueKind, key: BindingKey];
  "bindings:cleared": [];
}

/**
 * Two-way handle on one stored value. `get()` reads the store every time, so a
 * rendered input never holds a stale copy.
 */
export interface Binding<T> {
  get(): T;
  set(value: T): void;
}

type ScopedValues<T> = Map<string, Map<string, T>>;

type KindStorage = { [K in BindingValueKind]: ScopedValues<BindingValueMap[K]> };

export type BindingSnapshot = {
  [K in BindingValueKind]: Array<{ key: BindingKey; value: BindingValueMap[K] }>;
};

/**
 * Mutable per-screen state for inputs and template variables, one map per
 * value kind. Lives as long as the screen; `clear()` on teardown.
 *
 * Writes are synchronous and unguarded. Callers on other threads of control
 * must hand their writes to the UI thread first.
 *
 * @example
 * ```typescript
 * const store = new BindingStore();
 * store.setBool(bindingKey('notifyCustomer', job), true);
 * store.on('binding:changed', (kind, key, value) => scheduleRender());
 * ```
 */
export class BindingStore extends EventEmitter {
  private readonly values: KindStorage = {
    text: new Map(),
    bool: new Map(),
    double: new Map(),
    int: new Map(),
    date: new Map(),
    selection: new Map(),
    selections: new Map(),
  };

  /**
   * Type-safe event listener registration
   */
  on<K extends keyof BindingStoreEventMap>(
    event: K,
    listener: (...args: BindingStoreEventMap[K]) => void,
  ): this {
    return super.on(event, listener);
  }

  /**
   * Type-safe one-time event listener registration
   */
  once<K extends keyof BindingStoreEventMap>(
    event: K,
    listener: (...args: BindingStoreEventMap[K]) => void,
  ): this {
    return super.once(event, listener);
  }

  /**
   * Type-safe event emission
   */
  emit<K extends keyof BindingStoreEventMap>(event: K, ...args: BindingStoreEventMap[K]): boolean {
    return super.emit(event, ...args);
  }

  // ---------------------------------------------------------------------------
  // Generic access
  // ---------------------------------------------------------------------------

  get<K extends BindingValueKind>(kind: K, key: BindingKey): BindingValueMap[K] | undefined {
    const scopes: ScopedValues<BindingValueMap[K]> = this.values[kind];
    return scopes.get(key.field)?.get(key.scope);
  }

  set<K extends BindingValueKind>(kind: K, key: BindingKey, value: BindingValueMap[K]): void {
    const scopes: ScopedValues<BindingValueMap[K]> = this.values[kind];
    let byScope = scopes.get(key.field);
    if (!byScope) {
      byScope = new Map();
      scopes.set(key.field, byScope);
    }
    const previousValue = byScope.get(key.scope);
    byScope.set(key.scope, value);
    this.emit("binding:changed", kind, key, value, previousValue);
  }

  has(kind: BindingValueKind, key: BindingKey): boolean {
    return this.values[kind].get(key.field)?.has(key.scope) ?? false;
  }

  delete(kind: BindingValueKind, key: BindingKey): boolean {
    const byScope = this.values[kind].get(key.field);
    if (!byScope?.delete(key.scope)) {
      return false;
    }
    if (byScope.size === 0) {
      this.values[kind].delete(key.field);
    }
    this.emit("binding:deleted", kind, key);
    return true;
  }

  /**
   * Drop every stored value. Call when the screen is torn down.
   */
  clear(): void {
    for (const kind of BINDING_VALUE_KINDS) {
      this.values[kind].clear();
    }
    this.emit("bindings:cleared");
  }

  /**
   * Number of stored values across all kinds.
   */
  get size(): number {
    let total = 0;
    for (const kind of BINDING_VALUE_KINDS) {
      for (const byScope of this.values[kind].values()) {
        total += byScope.size;
      }
    }
    return total;
  }

  snapshot(): BindingSnapshot {
    return {
      text: this.entries("text"),
      bool: this.entries("bool"),
      double: this.entries("double"),
      int: this.entries("int"),
      date: this.entries("date"),
      selection: this.entries("selection"),
      selections: this.entries("selections"),
    };
  }

  private entries<K extends BindingValueKind>(
    kind: K,
  ): Array<{ key: BindingKey; value: BindingValueMap[K] }> {
    const scopes: ScopedValues<BindingValueMap[K]> = this.values[kind];
    const out: Array<{ key: BindingKey; value: BindingValueMap[K] }> = [];
    for (const [field, byScope] of scopes) {
      for (const [scope, value] of byScope) {
        out.push({ key: { field, scope }, value });
      }
    }
    return out;
  }

  // ---------------------------------------------------------------------------
  // Typed pairs
  // ---------------------------------------------------------------------------

  getText(key: BindingKey): string | undefined {
    return this.get("text", key);
  }

  setText(key: BindingKey, value: string): void {
    this.set("text", key, value);
  }

  getBool(key: BindingKey): boolean | undefined {
    return this.get("bool", key);
  }

  setBool(key: BindingKey, value: boolean): void {
    this.set("bool", key, value);
  }

  getDouble(key: BindingKey): number | undefined {
    return this.get("double", key);
  }

  setDouble(key: BindingKey, value: number): void {
    this.set("double", key, value);
  }

  getInt(key: BindingKey): number | undefined {
    return this.get("int", key);
  }

  /**
   * Stores `Math.trunc(value)`.
   */
  setInt(key: BindingKey, value: number): void {
    this.set("int", key, Math.trunc(value));
  }

  getDate(key: BindingKey): Date | undefined {
    return this.get("date", key);
  }

  setDate(key: BindingKey, value: Date): void {
    this.set("date", key, value);
  }

  getSelection(key: BindingKey): string | undefined {
    return this.get("selection", key);
  }

  setSelection(key: BindingKey, value: string): void {
    this.set("selection", key, value);
  }

  getSelections(key: BindingKey): readonly string[] | undefined {
    return this.get("selections", key);
  }

  setSelections(key: BindingKey, value: readonly string[]): void {
    this.set("selections", key, [...value]);
  }
}

/**
 * Live two-way binding on one stored value, reading `fallback` until the first
 * write. `int` bindings truncate on write like `setInt`.
 */
export function bind<K extends BindingValueKind>(
  store: BindingStore,
  kind: K,
  key: BindingKey,
  fallback: BindingValueMap[K],
): Binding<BindingValueMap[K]> {
  return {
    get: () => store.get(kind, key) ?? fallback,
    set: (value) => {
      if (kind === "int" && typeof value === "number") {
        store.setInt(key, value);
      } else {
        store.set(kind, key, value);
      }
    },
  };
}
