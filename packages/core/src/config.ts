import { z } from "zod";
import { ConfigError } from "sdui-shared";
import type { EngineLogger } from "sdui-kernel";
import { toDecodeIssues } from "./utils/issues";
import { MAX_SUPPORTED_VERSION, MIN_SUPPORTED_VERSION } from "./validation/version";

// =============================================================================
// Renderer
// =============================================================================

export const rendererConfigSchema = z
  .object({
    minSupportedVersion: z.number().int().min(1).default(MIN_SUPPORTED_VERSION),
    maxSupportedVersion: z.number().int().min(1).default(MAX_SUPPORTED_VERSION),
  })
  .strict()
  .refine((config) => config.minSupportedVersion <= config.maxSupportedVersion, {
    message: "minSupportedVersion must not exceed maxSupportedVersion",
    path: ["maxSupportedVersion"],
  });

export type RendererConfigInput = z.input<typeof rendererConfigSchema>;
export type RendererConfig = z.output<typeof rendererConfigSchema>;

/**
 * Collaborators that cannot be described as data.
 */
export interface RendererHooks {
  /** Clock for date inputs with no stored value (default: `new Date()`) */
  now?: () => Date;
  /** Logger for this renderer (default: `Logger.for('ScreenRenderer')`) */
  logger?: EngineLogger;
}

export function parseRendererConfig(input: unknown = {}): RendererConfig {
  const result = rendererConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError("renderer config", toDecodeIssues(result.error));
  }
  return result.data;
}

// =============================================================================
// Component cache
// =============================================================================

export const DEFAULT_CACHE_CAPACITY = 100;
export const DEFAULT_CACHE_MAX_AGE_MS = 10 * 60 * 1000;
/** Suggested period for the host's sweep timer */
export const DEFAULT_CACHE_SWEEP_INTERVAL_MS = 2 * 60 * 1000;

export const cacheOptionsSchema = z
  .object({
    capacity: z.number().int().positive().default(DEFAULT_CACHE_CAPACITY),
    maxAgeMs: z.number().positive().default(DEFAULT_CACHE_MAX_AGE_MS),
  })
  .strict();

export type CacheOptionsInput = z.input<typeof cacheOptionsSchema>;
export type CacheOptions = z.output<typeof cacheOptionsSchema>;

export function parseCacheOptions(input: unknown = {}): CacheOptions {
  const result = cacheOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError("cache options", toDecodeIssues(result.error));
  }
  return result.data;
}
