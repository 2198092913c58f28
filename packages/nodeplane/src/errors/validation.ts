/**
 * Contextual Validation Utilities
 *
 * Wraps Zod validation so that failures carry the type, operation and
 * node they happened on.
 *
 * @example
 * ```typescript
 * const props = validateNodeProps(schema, input, {
 *   type: "User",
 *   operation: "create",
 * });
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

// ============================================================
// Types
// ============================================================

/**
 * Context for validation operations.
 */
export type ValidationContext = Readonly<{
  /** Type name of the node */
  type: string;
  /** Operation being performed */
  operation: "create" | "update";
  /** Node ID (for updates) */
  id?: string;
  /** Path prefix for nested writes (e.g., "posts.create.0") */
  path?: string;
}>;

// ============================================================
// Validation Functions
// ============================================================

function zodIssuesToValidationIssues(
  error: ZodError,
  prefix: string | undefined,
): ValidationIssue[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join(".");
    return {
      path: prefix ? [prefix, path].filter(Boolean).join(".") : path,
      message: issue.message,
      code: issue.code,
    };
  });
}

function buildLocationString(context: ValidationContext): string {
  if (context.id) {
    return `${context.type}/${context.id}`;
  }
  return `new ${context.type}`;
}

/**
 * Validates node props with full context for error messages.
 *
 * @returns Validated and transformed props
 * @throws ValidationError with full context if validation fails
 */
export function validateNodeProps<T>(
  schema: ZodType<T>,
  props: unknown,
  context: ValidationContext,
): T {
  const result = schema.safeParse(props);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error, context.path);
  const summary = issues
    .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
    .join("; ");

  throw new ValidationError(
    `Invalid data for ${buildLocationString(context)}: ${summary}`,
    {
      type: context.type,
      operation: context.operation,
      ...(context.id !== undefined && { id: context.id }),
      issues,
    },
    { cause: result.error },
  );
}

/**
 * Creates a ValidationError for rules that live outside a Zod schema,
 * such as the shape of nested write arguments.
 *
 * @example
 * ```typescript
 * throw createValidationError(
 *   `"set" is only available on list relations`,
 *   [{ path: "author.set", message: "Not a list relation" }],
 *   { type: "Post", operation: "update" },
 * );
 * ```
 */
export function createValidationError(
  message: string,
  issues: ValidationIssue[],
  context?: Partial<ValidationContext>,
): ValidationError {
  return new ValidationError(message, {
    ...(context?.type !== undefined && { type: context.type }),
    ...(context?.operation !== undefined && { operation: context.operation }),
    ...(context?.id !== undefined && { id: context.id }),
    issues,
  });
}
