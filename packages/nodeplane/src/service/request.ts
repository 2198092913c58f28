/**
 * Request validation: operation lookup and argument shapes per action.
 */
import { z } from "zod";

import { RequestError } from "../errors/index";
import { type BoundSchema, type OperationDescriptor } from "../schema/types";
import { type OperationRequest, type Selection, type SelectionSet } from "./types";

// ============================================================
// Request Shape
// ============================================================

const recordSchema = z.record(z.string(), z.unknown());

const selectionSchema: z.ZodType<Selection> = z.lazy(() =>
  z.union([
    z.literal(true),
    z
      .object({
        args: recordSchema.optional(),
        select: selectionSetSchema.optional(),
      })
      .strict(),
  ]),
);

export const selectionSetSchema: z.ZodType<SelectionSet> = z.lazy(() =>
  z.record(z.string(), selectionSchema),
);

export const operationRequestSchema = z
  .object({
    operation: z.string().min(1),
    args: recordSchema.optional(),
    select: selectionSetSchema.optional(),
  })
  .strict();

// ============================================================
// Arguments per Action
// ============================================================

export const uniqueArgsSchema = z.object({ where: recordSchema }).strict();

export const createArgsSchema = z.object({ data: recordSchema }).strict();

export const updateArgsSchema = z
  .object({ where: recordSchema, data: recordSchema })
  .strict();

export const upsertArgsSchema = z
  .object({ where: recordSchema, create: recordSchema, update: recordSchema })
  .strict();

export const updateManyArgsSchema = z
  .object({ where: recordSchema.nullish(), data: recordSchema })
  .strict();

export const deleteManyArgsSchema = z
  .object({ where: recordSchema.nullish() })
  .strict();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * @throws RequestError (INVALID_ARGUMENTS)
 */
export function parseArgs<S extends z.ZodType>(
  schema: S,
  args: unknown,
  operation: string,
): z.output<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw new RequestError(
      `Invalid arguments for "${operation}": ${describeIssues(result.error)}`,
      "INVALID_ARGUMENTS",
      { operation },
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * @throws RequestError (INVALID_ARGUMENTS)
 */
export function parseOperationRequest(body: unknown): OperationRequest {
  const result = operationRequestSchema.safeParse(body);
  if (!result.success) {
    throw new RequestError(
      `Invalid request: ${describeIssues(result.error)}`,
      "INVALID_ARGUMENTS",
      {},
      {
        cause: result.error,
        suggestion: `Send { operation, args?, select? } or a GraphQL document.`,
      },
    );
  }
  return result.data;
}

/**
 * @throws RequestError (UNKNOWN_OPERATION)
 */
export function lookupOperation(
  schema: BoundSchema,
  name: string,
): OperationDescriptor {
  const descriptor = schema.catalog.get(name);
  if (descriptor === undefined) {
    throw new RequestError(
      `Unknown operation "${name}"`,
      "UNKNOWN_OPERATION",
      { operation: name },
      {
        suggestion: `Available operations: ${[...schema.catalog.keys()].join(", ")}.`,
      },
    );
  }
  return descriptor;
}
