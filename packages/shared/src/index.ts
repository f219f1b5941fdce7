/**
 * # SDUI Shared Types
 *
 * Platform-independent definitions shared by the engine packages: the decoded
 * screen schema and the error hierarchy.
 *
 * ```typescript
 * import type { Screen, ComponentNode } from 'sdui-shared';
 * import { isSchemaDecodeError } from 'sdui-shared';
 * ```
 *
 * @module sdui-shared
 */

export * from "./schema";
export * from "./errors";
