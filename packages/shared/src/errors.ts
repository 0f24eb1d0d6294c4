/**
 * Arbor Error Hierarchy
 *
 * Structured error classes for the resolution engine. All errors extend
 * ArborError which provides:
 * - Unique error codes for programmatic handling
 * - Rich metadata for debugging
 * - Serialization support for diagnostics sinks
 * - Type guards for catching specific error types
 *
 * Errors split into two families. Fatal errors (lifecycle violations and key
 * collisions) abort the pass and must never be caught by a per-component
 * handler. Everything else is reported and the failing subtree resolves to
 * `null`.
 *
 * @example Catching specific errors
 * ```typescript
 * try {
 *   pass.resolve(root, widthSpec, heightSpec);
 * } catch (error) {
 *   if (isLifecycleError(error)) {
 *     // Engine or caller bug
 *   } else if (isArborError(error)) {
 *     console.log(error.code, error.toJSON());
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., LIFECYCLE_RELEASED, KEY_COLLISION)
 */
export type ArborErrorCode =
  // Lifecycle
  | "LIFECYCLE_RELEASED"
  | "LIFECYCLE_DOUBLE_RELEASE"
  | "LIFECYCLE_IMMUTABLE"
  // Keys
  | "KEY_COLLISION"
  | "KEY_MISSING"
  // Resolution
  | "RESOLUTION_FAILED"
  | "RESOLUTION_COMPARISON_FAILED"
  | "RESOLUTION_UNSUPPORTED"
  // Validation
  | "VALIDATION_REQUIRED"
  | "VALIDATION_TYPE"
  | "VALIDATION_CONSTRAINT"
  // Context
  | "CONTEXT_NOT_FOUND";

/**
 * Serialized error format
 */
export interface SerializedArborError {
  name: string;
  code: ArborErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: SerializedArborError | { message: string; name?: string };
  stack?: string;
}

function isSerializedArborError(
  value: SerializedArborError | { message: string; name?: string },
): value is SerializedArborError {
  return "code" in value && typeof value.code === "string";
}

/**
 * Base class for all Arbor errors.
 */
export class ArborError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: ArborErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  constructor(
    code: ArborErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "ArborError";
    this.code = code;
    this.details = details;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor?: Function) => void;
    };
    if (typeof ErrorWithCapture.captureStackTrace === "function") {
      ErrorWithCapture.captureStackTrace(this, new.target);
    }
  }

  /**
   * Whether this error must abort the pass instead of being reported.
   */
  get fatal(): boolean {
    return false;
  }

  /**
   * Serialize error (JSON-safe)
   */
  toJSON(): SerializedArborError {
    const serialized: SerializedArborError = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause) {
      if (this.cause instanceof ArborError) {
        serialized.cause = this.cause.toJSON();
      } else if (this.cause instanceof Error) {
        serialized.cause = {
          message: this.cause.message,
          name: this.cause.name,
        };
      }
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedArborError): ArborError {
    let cause: Error | undefined;
    if (json.cause) {
      cause = isSerializedArborError(json.cause)
        ? ArborError.fromJSON(json.cause)
        : new Error(json.cause.message);
    }

    return new ArborError(json.code, json.message, json.details, cause);
  }
}

// =============================================================================
// Lifecycle Errors
// =============================================================================

/**
 * Thrown when a pass-scoped object is used outside its lifetime: access after
 * release, a second release, or mutation of a committed node.
 *
 * @example
 * ```typescript
 * throw LifecycleError.released('TreeState', context.lifecycleDebugString());
 * ```
 */
export class LifecycleError extends ArborError {
  constructor(
    message: string,
    code: "LIFECYCLE_RELEASED" | "LIFECYCLE_DOUBLE_RELEASE" | "LIFECYCLE_IMMUTABLE" = "LIFECYCLE_RELEASED",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "LifecycleError";
  }

  override get fatal(): boolean {
    return true;
  }

  /**
   * Create error for access to a released resource
   */
  static released(resource: string, lifecycle?: string): LifecycleError {
    return new LifecycleError(
      `Attempt to access ${resource} after release`,
      "LIFECYCLE_RELEASED",
      { resource, ...(lifecycle && { lifecycle }) },
    );
  }

  /**
   * Create error for a second release of the same context
   */
  static doubleRelease(lifecycle?: string): LifecycleError {
    return new LifecycleError(
      "Resolution context released more than once",
      "LIFECYCLE_DOUBLE_RELEASE",
      lifecycle ? { lifecycle } : {},
    );
  }

  /**
   * Create error for mutation of a node whose pass has ended
   */
  static immutable(nodeName: string): LifecycleError {
    return new LifecycleError(
      `Cannot mutate node <${nodeName}>: its resolution context was released`,
      "LIFECYCLE_IMMUTABLE",
      { node: nodeName },
    );
  }
}

// =============================================================================
// Key Errors
// =============================================================================

/**
 * Thrown when two components in one tree version resolve to the same global
 * key.
 */
export class KeyCollisionError extends ArborError {
  /** The colliding global key */
  readonly globalKey: string;

  constructor(globalKey: string, message?: string) {
    super(
      "KEY_COLLISION",
      message ?? `Duplicate global key "${globalKey}": sibling keys must be unique`,
      { globalKey },
    );
    this.name = "KeyCollisionError";
    this.globalKey = globalKey;
  }

  override get fatal(): boolean {
    return true;
  }
}

// =============================================================================
// Resolution Errors
// =============================================================================

/**
 * Wraps a failure raised while resolving one component, annotated with the
 * component hierarchy leading to it.
 *
 * @example
 * ```typescript
 * new ResolutionError('Counter', ['Root', 'Column', 'Counter'], cause);
 * // message: "Failed to resolve <Counter> at Root > Column > Counter: ..."
 * ```
 */
export class ResolutionError extends ArborError {
  /** Name of the component that failed */
  readonly component: string;

  /** Component names from the root down to the failing component */
  readonly hierarchy: readonly string[];

  constructor(
    component: string,
    hierarchy: readonly string[],
    cause: Error,
    code: "RESOLUTION_FAILED" | "RESOLUTION_COMPARISON_FAILED" | "RESOLUTION_UNSUPPORTED" = "RESOLUTION_FAILED",
  ) {
    const verb = code === "RESOLUTION_COMPARISON_FAILED" ? "compare" : "resolve";
    super(
      code,
      `Failed to ${verb} <${component}> at ${hierarchy.join(" > ")}: ${cause.message}`,
      { component, hierarchy: [...hierarchy] },
      cause,
    );
    this.name = "ResolutionError";
    this.component = component;
    this.hierarchy = hierarchy;
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Thrown when configuration or input values fail validation.
 */
export class ValidationError extends ArborError {
  /** Field or parameter that failed validation */
  readonly field: string;

  constructor(
    field: string,
    message: string,
    code: "VALIDATION_REQUIRED" | "VALIDATION_TYPE" | "VALIDATION_CONSTRAINT" = "VALIDATION_CONSTRAINT",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, { field, ...details }, cause);
    this.name = "ValidationError";
    this.field = field;
  }

  /**
   * Create a "required" validation error
   */
  static required(field: string, message?: string): ValidationError {
    return new ValidationError(field, message || `${field} is required`, "VALIDATION_REQUIRED");
  }
}

// =============================================================================
// Context Errors
// =============================================================================

/**
 * Thrown when code expects an execution context binding that is absent.
 */
export class ContextError extends ArborError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: Error) {
    super("CONTEXT_NOT_FOUND", message, details, cause);
    this.name = "ContextError";
  }

  static notFound(): ContextError {
    return new ContextError(
      "Context not found. Ensure you are running within a Context.run() block.",
    );
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isArborError(error: unknown): error is ArborError {
  return error instanceof ArborError;
}

export function isLifecycleError(error: unknown): error is LifecycleError {
  return error instanceof LifecycleError;
}

export function isKeyCollisionError(error: unknown): error is KeyCollisionError {
  return error instanceof KeyCollisionError;
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isContextError(error: unknown): error is ContextError {
  return error instanceof ContextError;
}

/**
 * Check whether an error must propagate out of per-component handlers.
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof ArborError && error.fatal;
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
