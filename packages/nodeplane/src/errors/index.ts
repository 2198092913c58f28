/**
 * Nodeplane Error Hierarchy
 *
 * All errors extend NodeplaneError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   await service.execute({ operation: "createUser", args: { data } });
 * } catch (error) {
 *   if (isNodeplaneError(error)) {
 *     console.error(error.toUserMessage());
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
 * - `constraint`: Business rule or schema constraint violation. Recoverable by changing data.
 * - `system`: Internal error or infrastructure issue. May require investigation or retry.
 */
export type ErrorCategory = "user" | "constraint" | "system";

/**
 * Options for NodeplaneError constructor.
 */
export type NodeplaneErrorOptions = Readonly<{
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
 * Base error class for all Nodeplane errors.
 */
export class NodeplaneError extends Error {
  /** Machine-readable error code (e.g., "NODE_NOT_FOUND") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: NodeplaneErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "NodeplaneError";
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
// Selector Errors (category: "user")
// ============================================================

export type SelectorErrorCode =
  | "INVALID_SELECTOR"
  | "NON_UNIQUE_SELECTOR"
  | "INVALID_FILTER"
  | "NODE_NOT_FOUND";

/**
 * Thrown when a `where` selector is malformed, references a field that
 * cannot identify a single node, or matches nothing where exactly one node
 * was required.
 */
export class SelectorError extends NodeplaneError {
  declare readonly code: SelectorErrorCode;

  constructor(
    message: string,
    code: SelectorErrorCode,
    details: Readonly<Record<string, unknown>> & { type: string },
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, code, {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        (code === "NODE_NOT_FOUND" ?
          `Verify that a ${details.type} matching the selector exists.`
        : `Select ${details.type} nodes by "id" or by one of its unique fields.`),
      cause: options?.cause,
    });
    this.name = "SelectorError";
  }
}

// ============================================================
// Mutation Errors
// ============================================================

/**
 * Thrown when a mutation cannot be applied. Every effect of the enclosing
 * mutation has been rolled back by the time this reaches the caller.
 */
export class MutationError extends NodeplaneError {
  constructor(
    message: string,
    code: string = "MUTATION_FAILED",
    options: Partial<NodeplaneErrorOptions> = {},
  ) {
    super(message, code, {
      details: options.details ?? {},
      category: options.category ?? "constraint",
      suggestion:
        options.suggestion ??
        `No changes were applied. Fix the failing sub-action and retry the whole mutation.`,
      cause: options.cause,
    });
    this.name = "MutationError";
  }
}

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "posts.create.0.title") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Details for ValidationError.
 */
export type ValidationErrorDetails = Readonly<{
  /** Type name of the node being written */
  type?: string;
  /** Operation being performed */
  operation?: "create" | "update";
  /** Node ID if updating */
  id?: string;
  /** Individual validation issues */
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when mutation data does not match the declared field types.
 */
export class ValidationError extends MutationError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const fieldList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following fields: ${fieldList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

/**
 * Thrown when a unique field would hold the same value on two nodes.
 */
export class UniquenessError extends MutationError {
  constructor(
    details: Readonly<{
      type: string;
      field: string;
      existingId: string;
      newId: string;
    }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Uniqueness violation on "${details.type}.${details.field}": value already used by node ${details.existingId}`,
      "UNIQUENESS_VIOLATION",
      {
        details,
        category: "constraint",
        suggestion: `Use a different value for "${details.field}", or update node ${details.existingId} instead.`,
        cause: options?.cause,
      },
    );
    this.name = "UniquenessError";
  }
}

/**
 * Thrown when a nested sub-action references a node that does not exist,
 * or that is not linked through the relation the sub-action targets.
 */
export class MissingNodeError extends MutationError {
  constructor(
    message: string,
    details: Readonly<{
      type: string;
      field?: string;
      where: Readonly<Record<string, unknown>>;
    }>,
    options?: { cause?: unknown },
  ) {
    super(message, "MISSING_NODE", {
      details,
      category: "constraint",
      suggestion: `Create the referenced ${details.type} first, or fix the selector.`,
      cause: options?.cause,
    });
    this.name = "MissingNodeError";
  }
}

/**
 * Thrown when a mutation would leave a required single relation empty.
 */
export class RequiredRelationError extends MutationError {
  constructor(
    details: Readonly<{ type: string; id: string; field: string }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Required relation "${details.type}.${details.field}" of node ${details.id} would be empty`,
      "REQUIRED_RELATION_VIOLATION",
      {
        details,
        category: "constraint",
        suggestion: `Connect another node through "${details.field}" in the same mutation, or delete ${details.type}/${details.id}.`,
        cause: options?.cause,
      },
    );
    this.name = "RequiredRelationError";
  }
}

/**
 * Thrown when the caller aborts a mutation before it commits.
 */
export class MutationAbortedError extends MutationError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Mutation "${operation}" was aborted`, "MUTATION_ABORTED", {
      details: { operation },
      category: "system",
      suggestion: `The mutation was rolled back. Retry it if the abort was not intended.`,
      cause: options?.cause,
    });
    this.name = "MutationAbortedError";
  }
}

// ============================================================
// Auth Errors (category: "user")
// ============================================================

export type AuthErrorReason =
  | "MISSING_TOKEN"
  | "MALFORMED_HEADER"
  | "INVALID_TOKEN"
  | "EXPIRED_TOKEN";

/**
 * Thrown when a request does not carry a valid service token while the
 * gate is configured with a secret.
 */
export class AuthError extends NodeplaneError {
  readonly reason: AuthErrorReason;

  constructor(
    message: string,
    reason: AuthErrorReason,
    options?: { cause?: unknown },
  ) {
    super(message, "AUTH_ERROR", {
      details: { reason },
      category: "user",
      suggestion:
        reason === "EXPIRED_TOKEN" ?
          `Generate a new service token.`
        : `Send "Authorization: Bearer <token>" with a token signed by the service secret.`,
      cause: options?.cause,
    });
    this.name = "AuthError";
    this.reason = reason;
  }
}

// ============================================================
// Schema Errors (category: "system")
// ============================================================

/**
 * Thrown when a data model cannot be bound. Fatal to startup.
 */
export class SchemaError extends NodeplaneError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "SCHEMA_ERROR", {
      details,
      category: "system",
      suggestion:
        options?.suggestion ?? `Fix the data model and restart the service.`,
      cause: options?.cause,
    });
    this.name = "SchemaError";
  }
}

// ============================================================
// Request Errors (category: "user")
// ============================================================

export type RequestErrorCode =
  | "UNKNOWN_OPERATION"
  | "INVALID_ARGUMENTS"
  | "INVALID_SELECTION"
  | "INVALID_DOCUMENT"
  | "SUBSCRIPTION_OVERFLOW";

/**
 * Thrown when a request names no known operation or carries arguments of
 * the wrong shape.
 */
export class RequestError extends NodeplaneError {
  constructor(
    message: string,
    code: RequestErrorCode,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, code, {
      details,
      category: "user",
      ...(options?.suggestion !== undefined && {
        suggestion: options.suggestion,
      }),
      cause: options?.cause,
    });
    this.name = "RequestError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when service or backend configuration is invalid.
 */
export class ConfigurationError extends NodeplaneError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion: options?.suggestion ?? `Review the service configuration.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Database Errors (category: "system")
// ============================================================

/**
 * Thrown when a database operation fails unexpectedly.
 */
export class DatabaseOperationError extends NodeplaneError {
  constructor(
    message: string,
    details: Readonly<{ operation: string; entity: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "DATABASE_OPERATION_ERROR", {
      details,
      category: "system",
      suggestion: `This is a system-level database error. Check the database and retry the operation.`,
      cause: options?.cause,
    });
    this.name = "DatabaseOperationError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for NodeplaneError.
 */
export function isNodeplaneError(error: unknown): error is NodeplaneError {
  return error instanceof NodeplaneError;
}

/**
 * Check if error is recoverable by user action (user or constraint error).
 *
 * @example
 * ```typescript
 * if (isUserRecoverable(error)) {
 *   showErrorToUser(error.toUserMessage());
 * } else {
 *   logAndAlertOps(error);
 * }
 * ```
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isNodeplaneError(error)) return false;
  return error.category === "user" || error.category === "constraint";
}

/**
 * Check if error indicates a system/infrastructure issue.
 */
export function isSystemError(error: unknown): boolean {
  return isNodeplaneError(error) && error.category === "system";
}

/**
 * Check if error is a constraint violation.
 */
export function isConstraintError(error: unknown): boolean {
  return isNodeplaneError(error) && error.category === "constraint";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isNodeplaneError(error) ? error.suggestion : undefined;
}

/**
 * Structured error entry returned in `{ errors: [...] }` responses.
 */
export type ErrorPayload = Readonly<{
  message: string;
  code: string;
  category: ErrorCategory;
  details: Readonly<Record<string, unknown>>;
  suggestion?: string;
}>;

/**
 * Converts any thrown value into a response payload. Non-library errors are
 * reported as internal errors without leaking their message.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (isNodeplaneError(error)) {
    return {
      message: error.message,
      code: error.code,
      category: error.category,
      details: error.details,
      ...(error.suggestion !== undefined && { suggestion: error.suggestion }),
    };
  }
  return {
    message: "Internal error",
    code: "INTERNAL_ERROR",
    category: "system",
    details: {},
  };
}
