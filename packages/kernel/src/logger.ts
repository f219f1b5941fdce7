/**
 * Logger - Structured logging with automatic render-scope injection
 *
 * Built on pino, with automatic injection of the active render's identity
 * (render_id, trace_id, screen_id) into every line.
 *
 * @example
 * ```typescript
 * import { Logger } from 'sdui-kernel';
 *
 * // Configure once at app start
 * Logger.configure({ level: 'info' });
 *
 * // Use anywhere - scope is auto-injected
 * const log = Logger.for('ScreenRenderer');
 * log.warn({ nodeId: 'email' }, 'Validation failed');
 * ```
 */

import pino, {
  type DestinationStream,
  type Logger as PinoLogger,
  type LoggerOptions,
  type TransportSingleOptions,
  type TransportMultiOptions,
} from "pino";
import { RenderScope, type RenderScopeState } from "./scope";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity, plus `silent` to disable output.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function toLogLevel(level: string): LogLevel {
  return LOG_LEVELS.find((candidate) => candidate === level) ?? "info";
}

/**
 * Function to extract fields from the active render scope for logging.
 *
 * @see {@link composeScopeFields} - Combine multiple extractors
 */
export type ScopeFieldsExtractor = (scope: RenderScopeState) => Record<string, unknown>;

export interface LoggerConfig {
  /** Log level (default: 'info') */
  level?: LogLevel;
  /** Pino transport configuration */
  transport?: TransportSingleOptions | TransportMultiOptions;
  /** Write to this stream instead of stdout (no transport is used) */
  destination?: DestinationStream;
  /** Auto-inject render scope into every log (default: true) */
  includeScope?: boolean;
  /**
   * Custom function to extract fields from the scope. Composed after the
   * default extractor when passed to `configure()`.
   */
  scopeFields?: ScopeFieldsExtractor;
  /** Base properties to include in every log */
  base?: Record<string, unknown>;
  /** Custom mixin function for additional properties */
  mixin?: () => Record<string, unknown>;
  /** Pretty print (default: true unless NODE_ENV is 'production' or 'test') */
  prettyPrint?: boolean;
  /** Replace existing config instead of merging (default: false) */
  replace?: boolean;
}

/**
 * Log method signature supporting both message-first and object-first forms.
 */
export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (obj: Record<string, unknown>, msg?: string, ...args: unknown[]): void;
}

export interface EngineLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;

  /** Create a child logger with additional bindings */
  child(bindings: Record<string, unknown>): EngineLogger;

  /** Current log level */
  readonly level: LogLevel;

  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Implementation
// =============================================================================

let globalLogger: PinoLogger | null = null;
let globalConfig: LoggerConfig = {};

const defaultScopeFieldsExtractor: ScopeFieldsExtractor = (scope) => {
  const fields: Record<string, unknown> = {
    render_id: scope.renderId,
    trace_id: scope.traceId,
  };
  if (scope.screenId !== undefined) fields.screen_id = scope.screenId;
  if (scope.screenVersion !== undefined) fields.screen_version = scope.screenVersion;
  return fields;
};

function getScopeFields(config: LoggerConfig): Record<string, unknown> {
  if (config.includeScope === false) {
    return {};
  }
  const scope = RenderScope.tryGet();
  if (!scope) {
    return {};
  }
  const extractor = config.scopeFields ?? defaultScopeFieldsExtractor;
  return extractor(scope);
}

function createPinoOptions(config: LoggerConfig): LoggerOptions {
  const env = process.env.NODE_ENV;
  const usePretty = config.prettyPrint ?? (env !== "production" && env !== "test");

  const options: LoggerOptions = {
    level: config.level ?? "info",
    base: config.base ?? { pid: process.pid },

    // Mixin runs on every log to inject scope
    mixin: () => {
      const scopeFields = getScopeFields(config);
      const customFields = config.mixin?.() ?? {};
      return { ...scopeFields, ...customFields };
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.destination) {
    return options;
  }

  if (config.transport) {
    options.transport = config.transport;
  } else if (usePretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return options;
}

function createPino(config: LoggerConfig): PinoLogger {
  const options = createPinoOptions(config);
  return config.destination ? pino(options, config.destination) : pino(options);
}

function wrapLogger(pinoLogger: PinoLogger): EngineLogger {
  return {
    trace: pinoLogger.trace.bind(pinoLogger),
    debug: pinoLogger.debug.bind(pinoLogger),
    info: pinoLogger.info.bind(pinoLogger),
    warn: pinoLogger.warn.bind(pinoLogger),
    error: pinoLogger.error.bind(pinoLogger),
    fatal: pinoLogger.fatal.bind(pinoLogger),

    child(bindings: Record<string, unknown>): EngineLogger {
      return wrapLogger(pinoLogger.child(bindings));
    },

    get level(): LogLevel {
      return toLogLevel(pinoLogger.level);
    },

    isLevelEnabled(level: LogLevel): boolean {
      return pinoLogger.isLevelEnabled(level);
    },
  };
}

function getOrCreateGlobalLogger(): PinoLogger {
  if (!globalLogger) {
    globalLogger = createPino(globalConfig);
  }
  return globalLogger;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Logger singleton for the engine.
 *
 * Loggers returned by `for()` and `child()` are bound to the global pino
 * instance at the time of the call; `configure()` replaces that instance, so
 * configure before creating module-level loggers, or create them lazily.
 */
export const Logger = {
  /**
   * Configure the global logger.
   */
  configure(config: LoggerConfig): void {
    if (config.replace) {
      globalConfig = config;
    } else {
      globalConfig = { ...globalConfig, ...config };
    }

    if (config.scopeFields) {
      globalConfig.scopeFields = composeScopeFields(defaultScopeFields, config.scopeFields);
    } else if (!globalConfig.scopeFields) {
      globalConfig.scopeFields = defaultScopeFields;
    }

    globalLogger = createPino(globalConfig);
  },

  get(): EngineLogger {
    return wrapLogger(getOrCreateGlobalLogger());
  },

  /**
   * Create a child logger scoped to a component name or object (uses constructor.name).
   */
  for(nameOrComponent: string | object): EngineLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return wrapLogger(getOrCreateGlobalLogger().child({ component: name }));
  },

  child(bindings: Record<string, unknown>): EngineLogger {
    return wrapLogger(getOrCreateGlobalLogger().child(bindings));
  },

  /**
   * Create a standalone logger instance. Does not affect the global logger.
   */
  create(config: LoggerConfig = {}): EngineLogger {
    return wrapLogger(createPino(config));
  },

  get level(): LogLevel {
    return toLogLevel(getOrCreateGlobalLogger().level);
  },

  setLevel(level: LogLevel): void {
    getOrCreateGlobalLogger().level = level;
  },

  isLevelEnabled(level: LogLevel): boolean {
    return getOrCreateGlobalLogger().isLevelEnabled(level);
  },

  /**
   * Reset the global logger (mainly for testing).
   */
  reset(): void {
    globalLogger = null;
    globalConfig = {};
  },
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Compose multiple scope field extractors into one.
 * Later extractors override earlier ones for the same keys.
 */
export function composeScopeFields(...extractors: ScopeFieldsExtractor[]): ScopeFieldsExtractor {
  return (scope) => {
    const result: Record<string, unknown> = {};
    for (const extractor of extractors) {
      Object.assign(result, extractor(scope));
    }
    return result;
  };
}

export const defaultScopeFields = defaultScopeFieldsExtractor;

export type { PinoLogger, DestinationStream, TransportSingleOptions, TransportMultiOptions };
