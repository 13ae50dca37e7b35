/**
 * Resolver Error Hierarchy
 *
 * All errors extend ResolverError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   await resolver.resolve(request, backend);
 * } catch (error) {
 *   if (isResolverError(error)) {
 *     console.error(error.toUserMessage());
 *     if (isUserRecoverable(error)) {
 *       // Render as a bad request, not an empty page
 *     }
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `system`: Backend or infrastructure failure. May require investigation or retry.
 */
export type ErrorCategory = "user" | "system";

/**
 * Options for ResolverError constructor.
 */
export type ResolverErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all resolver errors.
 */
export class ResolverError extends Error {
  /** Machine-readable error code (e.g., "ARGUMENT_ERROR") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: ResolverErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "ResolverError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Request Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid value (e.g., "limit") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Details for ArgumentError.
 */
export type ArgumentErrorDetails = Readonly<{
  /** Name of the offending request argument */
  argument: string;
  /** Sub-key of the argument that failed, when the argument is a mapping */
  key?: string;
  /** Individual validation issues */
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when a reserved control argument (pagination, distinct) is malformed.
 *
 * @example
 * ```typescript
 * try {
 *   await resolver.resolve(request, backend);
 * } catch (error) {
 *   if (error instanceof ArgumentError) {
 *     console.log(error.details.argument, error.details.key);
 *     // "page" "limit"
 *   }
 * }
 * ```
 */
export class ArgumentError extends ResolverError {
  declare readonly details: ArgumentErrorDetails;

  constructor(
    message: string,
    details: ArgumentErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "ARGUMENT_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the value of the "${details.argument}" argument.`,
      cause: options?.cause,
    });
    this.name = "ArgumentError";
  }
}

/**
 * Details for PredicateError.
 */
export type PredicateErrorDetails = Readonly<{
  /** Entity type the predicate targets */
  entityType?: string;
  /** Argument path from the field down to the failing node */
  path?: readonly string[];
  /** Offending operator, when the failure is operator specific */
  operator?: string;
}> &
  Readonly<Record<string, unknown>>;

/**
 * Thrown when a filter argument cannot be compiled into a predicate:
 * unknown field, unknown operator or an operand of the wrong shape.
 */
export class PredicateError extends ResolverError {
  declare readonly details: PredicateErrorDetails;

  constructor(
    message: string,
    details: PredicateErrorDetails = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "PREDICATE_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the filter arguments against the fields and operators the entity supports.`,
      cause: options?.cause,
    });
    this.name = "PredicateError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when resolver options or entity definitions are invalid.
 */
export class ConfigurationError extends ResolverError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review the resolver configuration for errors.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Backend Errors (category: "system")
// ============================================================

/**
 * Thrown when the query backend fails to execute a content or count query.
 *
 * The resolver never retries; retry policy belongs to the caller.
 */
export class BackendError extends ResolverError {
  constructor(
    message: string,
    details: Readonly<{ operation: string; entityType: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "BACKEND_ERROR", {
      details,
      category: "system",
      suggestion: `This is a backend failure. Check the database connection and retry the request. If the problem persists, investigate the underlying cause.`,
      cause: options?.cause,
    });
    this.name = "BackendError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for ResolverError.
 */
export function isResolverError(error: unknown): error is ResolverError {
  return error instanceof ResolverError;
}

/**
 * Check if error is recoverable by changing the request.
 *
 * @example
 * ```typescript
 * if (isUserRecoverable(error)) {
 *   respondBadRequest(error.toUserMessage());
 * } else {
 *   logAndAlertOps(error);
 * }
 * ```
 */
export function isUserRecoverable(error: unknown): boolean {
  return isResolverError(error) && error.category === "user";
}

/**
 * Check if error indicates a backend/infrastructure issue.
 */
export function isSystemError(error: unknown): boolean {
  return isResolverError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isResolverError(error) ? error.suggestion : undefined;
}
