import { z } from "zod";

import { RequestError } from "../errors/index";

const count = z.number().int().nonnegative();

/**
 * Arguments shared by list queries, connections and nested list fields.
 * GraphQL clients send `null` for absent arguments, so every key is
 * nullable.
 */
export const listArgsSchema = z
  .object({
    where: z.record(z.string(), z.unknown()).nullish(),
    orderBy: z.string().nullish(),
    skip: count.nullish(),
    after: z.string().nullish(),
    before: z.string().nullish(),
    first: count.nullish(),
    last: count.nullish(),
  })
  .strict();

export type ListArgs = z.input<typeof listArgsSchema>;

export type ParsedListArgs = Readonly<{
  where: Record<string, unknown> | undefined;
  orderBy: string | undefined;
  skip: number | undefined;
  after: string | undefined;
  before: string | undefined;
  first: number | undefined;
  last: number | undefined;
}>;

/**
 * @throws RequestError (INVALID_ARGUMENTS)
 */
export function parseListArgs(args: unknown): ParsedListArgs {
  const result = listArgsSchema.safeParse(args ?? {});
  if (!result.success) {
    throw new RequestError(
      `Invalid list arguments: ${result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`,
      "INVALID_ARGUMENTS",
      { issues: result.error.issues.map((issue) => issue.message) },
      {
        cause: result.error,
        suggestion: `skip, first and last take non-negative integers; after and before take node ids.`,
      },
    );
  }

  const { data } = result;
  return {
    where: data.where ?? undefined,
    orderBy: data.orderBy ?? undefined,
    skip: data.skip ?? undefined,
    after: data.after ?? undefined,
    before: data.before ?? undefined,
    first: data.first ?? undefined,
    last: data.last ?? undefined,
  };
}
