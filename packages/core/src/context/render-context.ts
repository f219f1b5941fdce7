import { BindingStore } from "./binding-store";
import { ActionTable } from "./action-table";

/**
 * Anything rendered as a list row. Only the id is interpreted by the engine;
 * it scopes binding keys and cache entries to the record.
 */
export interface DomainRecord {
  readonly id: string;
}

/**
 * Derives a display string from a record. Returning `undefined` means the
 * field is absent.
 */
export type RecordAccessor<R extends DomainRecord> = (record: R) => string | undefined;

export type RecordAccessors<R extends DomainRecord> = Readonly<Record<string, RecordAccessor<R>>>;

/**
 * Runtime state for one render pass.
 *
 * Everything but `currentRecord` is shared by reference between a context and
 * the contexts derived from it.
 */
export interface RenderContext<R extends DomainRecord = DomainRecord> {
  readonly records: readonly R[];
  readonly currentRecord: R | null;
  readonly bindings: BindingStore;
  readonly actions: ActionTable<R>;
  readonly accessors: RecordAccessors<R>;
  /** Opaque handles for host code; never read by the engine */
  readonly services: Readonly<Record<string, unknown>>;
}

export interface RenderContextOptions<R extends DomainRecord> {
  records?: readonly R[];
  bindings?: BindingStore;
  actions?: ActionTable<R>;
  accessors?: RecordAccessors<R>;
  services?: Record<string, unknown>;
}

export function createRenderContext<R extends DomainRecord = DomainRecord>(
  options: RenderContextOptions<R> = {},
): RenderContext<R> {
  return {
    records: options.records ?? [],
    currentRecord: null,
    bindings: options.bindings ?? new BindingStore(),
    actions: options.actions ?? new ActionTable<R>(),
    accessors: options.accessors ?? {},
    services: options.services ?? {},
  };
}

/**
 * A new context with only `currentRecord` replaced. The parent is untouched.
 */
export function withCurrentRecord<R extends DomainRecord>(
  context: RenderContext<R>,
  record: R | null,
): RenderContext<R> {
  return { ...context, currentRecord: record };
}

/**
 * A new context over a different record collection, e.g. after the host
 * reloads its data.
 */
export function withRecords<R extends DomainRecord>(
  context: RenderContext<R>,
  records: readonly R[],
): RenderContext<R> {
  return { ...context, records };
}
