/**
 * Data / label resolution
 *
 * Total functions: every path ends in a string, a missing accessor or field
 * yields the empty string, and an accessor that throws is treated as absent.
 */

import { UnregisteredBindingWarning, ensureError, type ComponentNode } from "sdui-shared";
import { Logger, type EngineLogger } from "sdui-kernel";
import { bindingKey } from "../context/binding-store";
import type { DomainRecord, RecordAccessor, RenderContext } from "../context/render-context";

const TEMPLATE_PATTERN = /\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g;

function log(): EngineLogger {
  return Logger.for("DataResolver");
}

/**
 * Names of the `{{name}}` variables in `text`, in order of first appearance.
 */
export function templateVariables(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(TEMPLATE_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Value a template variable expands to: the text binding scoped to the
 * current record, then the global one, then empty.
 */
export function templateValue<R extends DomainRecord>(
  name: string,
  context: RenderContext<R>,
): string {
  const { bindings, currentRecord } = context;
  if (currentRecord) {
    const scoped = bindings.getText(bindingKey(name, currentRecord));
    if (scoped !== undefined) {
      return scoped;
    }
  }
  return bindings.getText(bindingKey(name)) ?? "";
}

export function expandTemplate<R extends DomainRecord>(
  text: string,
  context: RenderContext<R>,
): string {
  if (!text.includes("{{")) {
    return text;
  }
  return text.replace(TEMPLATE_PATTERN, (_match, name: string) => templateValue(name, context));
}

/**
 * Look up `key` in the accessor table against the current record. Absent when
 * there is no record, no such accessor, or the accessor throws.
 */
export function resolveRecordValue<R extends DomainRecord>(
  key: string | undefined,
  context: RenderContext<R>,
): string | undefined {
  const record = context.currentRecord;
  if (key === undefined || record === null) {
    return undefined;
  }
  const accessor = context.accessors[key];
  if (!accessor) {
    const warning = new UnregisteredBindingWarning("accessor", key);
    log().debug({ code: warning.code, accessor: key, recordId: record.id }, warning.message);
    return undefined;
  }
  try {
    return accessor(record);
  } catch (error) {
    log().warn(
      { err: ensureError(error), accessor: key, recordId: record.id },
      "Accessor threw; treating value as absent",
    );
    return undefined;
  }
}

/**
 * Static text (templates expanded) → record field via `key` → empty.
 */
export function resolveText<R extends DomainRecord>(
  component: ComponentNode,
  context: RenderContext<R>,
): string {
  if (component.text !== undefined) {
    return expandTemplate(component.text, context);
  }
  return resolveRecordValue(component.key, context) ?? "";
}

/**
 * Record field via `key` → static label → empty.
 */
export function resolveLabel<R extends DomainRecord>(
  component: ComponentNode,
  context: RenderContext<R>,
): string {
  return resolveRecordValue(component.key, context) ?? component.label ?? "";
}

// =============================================================================
// Accessor helpers
// =============================================================================

/**
 * Stringifies a record property. `null`/`undefined` are absent; dates become
 * ISO strings.
 */
export function fieldAccessor<R extends DomainRecord>(field: keyof R & string): RecordAccessor<R> {
  return (record) => {
    const value: unknown = record[field];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    return String(value);
  };
}

export type DateStyle = "time" | "date" | "dateTime";

const DATE_FORMAT_OPTIONS: Record<DateStyle, Intl.DateTimeFormatOptions> = {
  time: { timeStyle: "short" },
  date: { dateStyle: "medium" },
  dateTime: { dateStyle: "medium", timeStyle: "short" },
};

/**
 * Formats a Date-valued property. Absent when the property is not a valid date.
 */
export function formattedDateAccessor<R extends DomainRecord>(
  field: keyof R & string,
  style: DateStyle = "dateTime",
  locale: string = "en-US",
  timeZone?: string,
): RecordAccessor<R> {
  const format = new Intl.DateTimeFormat(locale, { ...DATE_FORMAT_OPTIONS[style], timeZone });
  return (record) => {
    const value: unknown = record[field];
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      return undefined;
    }
    return format.format(value);
  };
}

/**
 * `"true"` or `"false"`. Pair with a conditional node: both are non-empty, so
 * use `presenceAccessor` for visibility instead.
 */
export function flagAccessor<R extends DomainRecord>(
  predicate: (record: R) => boolean,
): RecordAccessor<R> {
  return (record) => (predicate(record) ? "true" : "false");
}

/**
 * `"true"` when the predicate holds, absent otherwise. Drives conditional nodes.
 */
export function presenceAccessor<R extends DomainRecord>(
  predicate: (record: R) => boolean,
): RecordAccessor<R> {
  return (record) => (predicate(record) ? "true" : undefined);
}
