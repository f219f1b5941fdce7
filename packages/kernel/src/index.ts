/**
 * # SDUI Kernel
 *
 * Runtime primitives the engine builds upon.
 *
 * - **Logger** - Structured pino logging with render-scope injection
 * - **RenderScope** - Identity of the render in progress
 * - **Telemetry** - Pluggable spans and metrics
 *
 * ```typescript
 * import { Logger, Telemetry } from 'sdui-kernel';
 *
 * Logger.configure({ level: 'debug' });
 * Telemetry.setProvider(myProvider);
 * ```
 *
 * @module sdui-kernel
 */

export * from "./scope";
export * from "./telemetry";
export * from "./logger";
