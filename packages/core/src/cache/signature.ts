/**
 * Cache signatures
 *
 * A signature identifies everything a composite subtree's rendered output
 * depends on, so equal signatures mean interchangeable views. It is the
 * SHA-256 of the JSON array
 *
 *   ["sdui-cache/1", path, node.id, nodeFingerprint, recordScope,
 *    recordsFingerprint, identity(bindings), identity(actions),
 *    identity(accessors), ...identity(scopeObjects), templateValues]
 *
 * - `nodeFingerprint`: SHA-256 of the node's canonical JSON (sorted keys,
 *   children and item view included). Memoised per node object.
 * - `recordScope`: `[id, identity(record)]` of the current record, or "global".
 * - `recordsFingerprint`: SHA-256 of the ordered `[id, identity(record)]`
 *   pairs. Memoised per array.
 * - `identity(x)`: a per-object sequence number. Replacing the binding store,
 *   action table, accessor table or any scope object changes the signature.
 * - `templateValues`: current values of every `{{name}}` variable used in the
 *   subtree, in order.
 *
 * Record contents are not hashed. A host that passes updated records as new
 * objects gets new signatures; one that mutates a record in place expires the
 * affected entries itself (`expire` / `clearCache`).
 */

import { createHash } from "node:crypto";
import type { ComponentNode } from "sdui-shared";
import { GLOBAL_SCOPE } from "../context/binding-store";
import type { DomainRecord, RenderContext } from "../context/render-context";
import { templateValue, templateVariables } from "../resolvers/data";

export const SIGNATURE_VERSION = "sdui-cache/1";

function sha256(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/**
 * JSON with object keys sorted at every level. `undefined` members are dropped
 * as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? "null" : canonicalJson(item))).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);
    return `{${members.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

const nodeFingerprints = new WeakMap<ComponentNode, string>();

export function nodeFingerprint(node: ComponentNode): string {
  let fingerprint = nodeFingerprints.get(node);
  if (fingerprint === undefined) {
    fingerprint = sha256(canonicalJson(node));
    nodeFingerprints.set(node, fingerprint);
  }
  return fingerprint;
}

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

export function objectIdentity(value: object): number {
  let identity = identities.get(value);
  if (identity === undefined) {
    identity = nextIdentity++;
    identities.set(value, identity);
  }
  return identity;
}

/** A record's id paired with its object identity */
function recordKey(record: DomainRecord): [string, number] {
  return [record.id, objectIdentity(record)];
}

const recordFingerprints = new WeakMap<readonly DomainRecord[], string>();

export function recordsFingerprint(records: readonly DomainRecord[]): string {
  let fingerprint = recordFingerprints.get(records);
  if (fingerprint === undefined) {
    fingerprint = sha256(JSON.stringify(records.map(recordKey)));
    recordFingerprints.set(records, fingerprint);
  }
  return fingerprint;
}

const subtreeVariables = new WeakMap<ComponentNode, readonly string[]>();

/**
 * Every template variable used by `node` and its descendants, in first-seen
 * order.
 */
export function subtreeTemplateVariables(node: ComponentNode): readonly string[] {
  const cached = subtreeVariables.get(node);
  if (cached) {
    return cached;
  }
  const names: string[] = [];
  const add = (list: readonly string[]) => {
    for (const name of list) {
      if (!names.includes(name)) names.push(name);
    }
  };
  if (node.text !== undefined) {
    add(templateVariables(node.text));
  }
  for (const child of node.children ?? []) {
    add(subtreeTemplateVariables(child));
  }
  if (node.itemView) {
    add(subtreeTemplateVariables(node.itemView));
  }
  subtreeVariables.set(node, names);
  return names;
}

export interface SignatureInput<R extends DomainRecord> {
  /** Position of the node in the tree, e.g. `root/0/2` */
  path: string;
  node: ComponentNode;
  context: RenderContext<R>;
  /** Further collaborators the output depends on (style resolver, factory) */
  scope?: readonly object[];
}

export function computeSignature<R extends DomainRecord>(input: SignatureInput<R>): string {
  const { path, node, context } = input;
  const parts: unknown[] = [
    SIGNATURE_VERSION,
    path,
    node.id,
    nodeFingerprint(node),
    context.currentRecord ? recordKey(context.currentRecord) : GLOBAL_SCOPE,
    recordsFingerprint(context.records),
    objectIdentity(context.bindings),
    objectIdentity(context.actions),
    objectIdentity(context.accessors),
    ...(input.scope ?? []).map(objectIdentity),
    subtreeTemplateVariables(node).map((name) => templateValue(name, context)),
  ];
  return sha256(JSON.stringify(parts));
}
