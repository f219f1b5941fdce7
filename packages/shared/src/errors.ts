/**
 * SDUI Error Hierarchy
 *
 * Structured error classes for consistent error handling across the engine.
 * All errors extend SDUIError which provides:
 * - Unique error codes for programmatic handling
 * - Rich metadata for debugging
 * - Serialization support for shipping diagnostics to a server
 * - Type guards for catching specific error types
 *
 * Most of these never escape a render: the renderer turns them into inline
 * error views or a fallback screen and logs them. Only decoding and
 * configuration throw to the caller.
 *
 * @example Catching decode failures
 * ```typescript
 * try {
 *   const screen = decodeScreen(payload);
 * } catch (error) {
 *   if (isSchemaDecodeError(error)) {
 *     for (const issue of error.issues) console.warn(issue.path, issue.message);
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., DECODE_JSON, VALIDATION_REQUIRED)
 */
export type SDUIErrorCode =
  // Decoding
  | "DECODE_JSON"
  | "DECODE_SCHEMA"
  // Validation
  | "VALIDATION_REQUIRED"
  | "VALIDATION_CONSTRAINT"
  // Versioning
  | "VERSION_UNSUPPORTED"
  // Bindings
  | "BINDING_UNREGISTERED"
  // Rendering
  | "RENDER_FAILED"
  // Context
  | "CONTEXT_NOT_FOUND"
  // Configuration
  | "CONFIG_INVALID";

/**
 * Serialized error format for transport
 */
export interface SerializedSDUIError {
  name: string;
  code: SDUIErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: SerializedSDUIError | { message: string; name?: string };
  stack?: string;
}

/**
 * Base class for all SDUI errors.
 */
export class SDUIError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: SDUIErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  constructor(
    code: SDUIErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "SDUIError";
    this.code = code;
    this.details = details;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error for transport (JSON-safe)
   */
  toJSON(): SerializedSDUIError {
    const serialized: SerializedSDUIError = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause instanceof SDUIError) {
      serialized.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      serialized.cause = { message: this.cause.message, name: this.cause.name };
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedSDUIError): SDUIError {
    let cause: Error | undefined;
    if (json.cause) {
      cause =
        "code" in json.cause ? SDUIError.fromJSON(json.cause) : new Error(json.cause.message);
    }
    return new SDUIError(json.code, json.message, json.details, cause);
  }
}

// =============================================================================
// Decode Errors
// =============================================================================

export interface DecodeIssue {
  /** Location in the document, e.g. `component.children[1].type` */
  path: string;
  message: string;
}

/**
 * Error thrown when a screen document is not valid JSON or does not match the
 * schema. Carries every issue found, not only the first.
 *
 * @example
 * ```typescript
 * throw SchemaDecodeError.invalidJson(new SyntaxError('Unexpected token'));
 * throw SchemaDecodeError.invalidSchema([{ path: 'version', message: 'Required' }]);
 * ```
 */
export class SchemaDecodeError extends SDUIError {
  readonly issues: readonly DecodeIssue[];

  constructor(
    message: string,
    issues: readonly DecodeIssue[],
    code: "DECODE_JSON" | "DECODE_SCHEMA" = "DECODE_SCHEMA",
    cause?: Error,
  ) {
    super(code, message, { issues }, cause);
    this.name = "SchemaDecodeError";
    this.issues = issues;
  }

  static invalidJson(cause: Error): SchemaDecodeError {
    return new SchemaDecodeError(
      `Screen document is not valid JSON: ${cause.message}`,
      [{ path: "", message: cause.message }],
      "DECODE_JSON",
      cause,
    );
  }

  static invalidSchema(issues: readonly DecodeIssue[]): SchemaDecodeError {
    const first = issues[0];
    const summary = first
      ? `${first.path || "<root>"}: ${first.message}`
      : "unknown schema violation";
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : "";
    return new SchemaDecodeError(
      `Screen document does not match the schema: ${summary}${more}`,
      issues,
      "DECODE_SCHEMA",
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * A component that is missing a required attribute or violates an attribute
 * constraint. Never thrown across the render boundary; the renderer logs it and
 * draws an inline error view in place of the node.
 */
export class NodeValidationError extends SDUIError {
  readonly nodeId: string;
  readonly nodeType: string;
  /** Attribute that failed validation */
  readonly field: string;

  constructor(
    nodeId: string,
    nodeType: string,
    field: string,
    message: string,
    code: "VALIDATION_REQUIRED" | "VALIDATION_CONSTRAINT" = "VALIDATION_REQUIRED",
  ) {
    super(code, message, { nodeId, nodeType, field });
    this.name = "NodeValidationError";
    this.nodeId = nodeId;
    this.nodeType = nodeType;
    this.field = field;
  }
}

// =============================================================================
// Version Errors
// =============================================================================

export class UnsupportedVersionError extends SDUIError {
  readonly version: number;
  readonly minSupported: number;
  readonly maxSupported: number;

  constructor(version: number, minSupported: number, maxSupported: number) {
    super(
      "VERSION_UNSUPPORTED",
      `Screen version ${version} is not supported (supported: ${minSupported}-${maxSupported})`,
      { version, minSupported, maxSupported },
    );
    this.name = "UnsupportedVersionError";
    this.version = version;
    this.minSupported = minSupported;
    this.maxSupported = maxSupported;
  }
}

// =============================================================================
// Binding Warnings
// =============================================================================

export type BindingKind = "action" | "accessor";

/**
 * Describes a schema reference to an action or accessor the host never
 * registered. Logged, never thrown: the node still renders.
 */
export class UnregisteredBindingWarning extends SDUIError {
  readonly kind: BindingKind;
  readonly bindingName: string;

  constructor(kind: BindingKind, bindingName: string) {
    super("BINDING_UNREGISTERED", `No ${kind} registered under '${bindingName}'`, {
      kind,
      bindingName,
    });
    this.name = "UnregisteredBindingWarning";
    this.kind = kind;
    this.bindingName = bindingName;
  }
}

// =============================================================================
// Render Errors
// =============================================================================

/**
 * Wraps an unexpected exception raised while rendering a single node.
 */
export class RenderError extends SDUIError {
  readonly nodeId: string;
  readonly nodeType: string;

  constructor(nodeId: string, nodeType: string, cause: Error) {
    super("RENDER_FAILED", cause.message, { nodeId, nodeType }, cause);
    this.name = "RenderError";
    this.nodeId = nodeId;
    this.nodeType = nodeType;
  }
}

// =============================================================================
// Context Errors
// =============================================================================

export class ContextError extends SDUIError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: Error) {
    super("CONTEXT_NOT_FOUND", message, details, cause);
    this.name = "ContextError";
  }

  /**
   * Create "scope not found" error with helpful message
   */
  static notFound(): ContextError {
    return new ContextError(
      "Render scope not found. Ensure you are running within a RenderScope.run() block.",
    );
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends SDUIError {
  readonly issues: readonly DecodeIssue[];

  constructor(subject: string, issues: readonly DecodeIssue[]) {
    const detail = issues.map((issue) => `${issue.path || "<root>"}: ${issue.message}`).join("; ");
    super("CONFIG_INVALID", `Invalid ${subject}: ${detail}`, { subject, issues });
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSDUIError(error: unknown): error is SDUIError {
  return error instanceof SDUIError;
}

export function isSchemaDecodeError(error: unknown): error is SchemaDecodeError {
  return error instanceof SchemaDecodeError;
}

export function isNodeValidationError(error: unknown): error is NodeValidationError {
  return error instanceof NodeValidationError;
}

export function isUnsupportedVersionError(error: unknown): error is UnsupportedVersionError {
  return error instanceof UnsupportedVersionError;
}

export function isUnregisteredBindingWarning(
  error: unknown,
): error is UnregisteredBindingWarning {
  return error instanceof UnregisteredBindingWarning;
}

export function isRenderError(error: unknown): error is RenderError {
  return error instanceof RenderError;
}

export function isContextError(error: unknown): error is ContextError {
  return error instanceof ContextError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Ensure a value is an Error, wrapping if necessary.
 * Useful for catch blocks that might receive non-Error values.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

/**
 * Wrap any error as an SDUI error if it isn't already.
 */
export function wrapAsSDUIError(
  error: unknown,
  defaultCode: SDUIErrorCode = "RENDER_FAILED",
): SDUIError {
  if (error instanceof SDUIError) {
    return error;
  }
  const err = ensureError(error);
  return new SDUIError(defaultCode, err.message, {}, err);
}
