/**
 * Screen decoding
 *
 * Turns a UTF-8 JSON document into an immutable {@link Screen}. Every node is
 * checked against the attribute schema below; unknown type tags, a missing
 * `type` and wrongly typed attributes fail the whole document with a
 * {@link SchemaDecodeError} listing each offending path.
 *
 * Attributes the schema does not name are kept in `extras` so that domain
 * widget factories can read them. Nodes without an `id` get one derived from
 * their position (`auto:component.children[0]`), so decoding the same bytes
 * twice yields identical trees.
 */

import { z } from "zod";
import {
  SchemaDecodeError,
  ensureError,
  isComponentType,
  type ComponentNode,
  type ComponentType,
  type Screen,
} from "sdui-shared";
import { formatIssuePath, toDecodeIssues } from "../utils/issues";

const pickerOptionSchema = z.object({
  id: z.string(),
  text: z.string(),
  value: z.string(),
});

const offsetSchema = z.object({ x: z.number(), y: z.number() });

const attributeShape = {
  key: z.string().optional(),
  text: z.string().optional(),
  label: z.string().optional(),
  placeholder: z.string().optional(),
  valueKey: z.string().optional(),
  conditionKey: z.string().optional(),
  actionId: z.string().optional(),
  dataKey: z.string().optional(),

  font: z.string().optional(),
  fontWeight: z.string().optional(),
  color: z.string().optional(),
  foregroundColor: z.string().optional(),
  backgroundColor: z.string().optional(),

  padding: z.number().optional(),
  spacing: z.number().optional(),
  columns: z.number().int().optional(),

  cornerRadius: z.number().optional(),
  borderWidth: z.number().optional(),
  borderColor: z.string().optional(),
  shadowRadius: z.number().optional(),
  shadowColor: z.string().optional(),
  shadowOffset: offsetSchema.optional(),
  opacity: z.number().optional(),
  rotation: z.number().optional(),
  scale: z.number().optional(),

  imageName: z.string().optional(),
  url: z.string().optional(),
  webURL: z.string().optional(),

  minValue: z.number().optional(),
  maxValue: z.number().optional(),
  step: z.number().optional(),
  showValue: z.boolean().optional(),
  options: z.array(pickerOptionSchema).optional(),
  selectionMode: z.enum(["single", "multiple"]).optional(),

  destination: z.string().optional(),
  isPresented: z.string().optional(),
  title: z.string().optional(),
  message: z.string().optional(),

  progress: z.number().optional(),
  gaugeMin: z.number().optional(),
  gaugeMax: z.number().optional(),
  centerLatitude: z.number().optional(),
  centerLongitude: z.number().optional(),
  span: z.number().optional(),
  chartType: z.string().optional(),

  reorderable: z.boolean().optional(),

  animation: z.object({ type: z.string().optional(), duration: z.number().optional() }).optional(),
  transition: z.object({ type: z.string().optional() }).optional(),
};

const STRUCTURAL_KEYS = ["id", "type", "children", "itemView"];

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  ...STRUCTURAL_KEYS,
  ...Object.keys(attributeShape),
]);

const componentTypeSchema = z
  .string()
  .refine((value): value is ComponentType => isComponentType(value), (value) => ({
    message: `Unknown component type '${value}'`,
  }));

export const componentNodeSchema: z.ZodType<ComponentNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      id: z.string().optional(),
      type: componentTypeSchema,
      children: z.array(componentNodeSchema).optional(),
      itemView: componentNodeSchema.optional(),
      ...attributeShape,
    })
    .passthrough()
    .transform((raw, ctx): ComponentNode => {
      const { id, type, children, itemView, ...attributes } = raw;
      const extras: Record<string, unknown> = {};
      for (const name of Object.keys(attributes)) {
        if (!KNOWN_KEYS.has(name)) {
          extras[name] = attributes[name];
          delete attributes[name];
        }
      }
      return {
        ...attributes,
        id: id ?? `auto:${formatIssuePath(ctx.path)}`,
        type,
        ...(children !== undefined && { children }),
        ...(itemView !== undefined && { itemView }),
        extras,
      };
    }),
);

export const screenSchema = z.object({
  version: z.number().int(),
  component: componentNodeSchema,
});

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode a screen document.
 *
 * @throws SchemaDecodeError when the input is not UTF-8 JSON or does not match the schema
 */
export function decodeScreen(input: Uint8Array | string): Screen {
  let json: unknown;
  try {
    const text = typeof input === "string" ? input : utf8.decode(input);
    json = JSON.parse(text);
  } catch (error) {
    throw SchemaDecodeError.invalidJson(ensureError(error));
  }
  return parseScreen(json);
}

/**
 * Validate an already-parsed JSON value as a screen.
 */
export function parseScreen(json: unknown): Screen {
  const result = screenSchema.safeParse(json);
  if (!result.success) {
    throw SchemaDecodeError.invalidSchema(toDecodeIssues(result.error));
  }
  return result.data;
}

function toJson(node: ComponentNode): Record<string, unknown> {
  const { extras, children, itemView, ...attributes } = node;
  return {
    ...extras,
    ...attributes,
    ...(children !== undefined && { children: children.map(toJson) }),
    ...(itemView !== undefined && { itemView: toJson(itemView) }),
  };
}

/**
 * Serialise a screen back to its JSON document, with extras restored as
 * top-level attributes.
 */
export function encodeScreen(screen: Screen): string {
  return JSON.stringify({ version: screen.version, component: toJson(screen.component) });
}
