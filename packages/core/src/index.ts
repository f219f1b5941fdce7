/**
 * # SDUI
 *
 * Server-driven UI rendering engine. A server sends a versioned JSON document
 * describing a screen; the engine decodes it, validates each node, resolves
 * data and style against the host's records, and builds views through a
 * host-supplied factory.
 *
 * ## Key Features
 *
 * - **Decoding** - Zod-validated screen documents with every issue reported
 * - **Bindings** - Typed two-way state for inputs, scoped per record
 * - **Error boundaries** - A malformed node draws an inline error, never a crash
 * - **Version gating** - Unsupported documents render one fallback view
 * - **Caching** - LRU + TTL memoisation of composite subtrees
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ScreenRenderer, ComponentCache, createRenderContext, decodeScreen } from 'sdui';
 *
 * const renderer = new ScreenRenderer({ factory: myFactory, cache: new ComponentCache() });
 * const context = createRenderContext({ records: jobs, accessors });
 * context.actions.register('startJob', (job) => start(job));
 *
 * const view = renderer.render(decodeScreen(payload), context);
 * ```
 *
 * @module sdui
 */

// Schema
export * from "./schema/decode";
export * from "./utils/issues";

// Configuration
export * from "./config";

// Context
export * from "./context/binding-store";
export * from "./context/action-table";
export * from "./context/render-context";

// Resolvers
export * from "./resolvers/data";
export * from "./resolvers/style";
export * from "./resolvers/animation";

// Validation
export * from "./validation/validate";
export * from "./validation/error-view";
export * from "./validation/version";

// Cache
export * from "./cache/signature";
export * from "./cache/component-cache";

// Rendering
export * from "./renderer/elements";
export * from "./renderer/inputs";
export * from "./renderer/renderer";
export { TreeViewFactory, findAll, countKind, elementOf, type ViewNode } from "./renderer/tree-factory";

// Shared types and errors
export * from "sdui-shared";
