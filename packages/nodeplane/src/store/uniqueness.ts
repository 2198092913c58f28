/**
 * Uniqueness Entry Management
 *
 * Keeps the unique-key table in step with the unique scalar fields of
 * stored nodes.
 */
import { type StoreOperations } from "../backend/types";
import { UniquenessError } from "../errors/index";
import { type BoundType } from "../schema/types";

/**
 * Context for uniqueness operations.
 */
export type UniquenessContext = Readonly<{
  serviceId: string;
  backend: StoreOperations;
}>;

/**
 * Encodes a field value as a unique key. Values of different JSON types
 * never share a key.
 */
export function computeUniqueKey(value: unknown): string {
  return JSON.stringify(value);
}

function declaredUniqueFields(type: BoundType): readonly string[] {
  return type.scalarFields
    .filter((field) => field.unique && !field.system)
    .map((field) => field.name);
}

async function claim(
  ctx: UniquenessContext,
  type: BoundType,
  field: string,
  value: unknown,
  id: string,
): Promise<void> {
  const holder = await ctx.backend.insertUnique({
    serviceId: ctx.serviceId,
    kind: type.name,
    field,
    key: computeUniqueKey(value),
    nodeId: id,
  });

  if (holder !== id) {
    throw new UniquenessError({
      type: type.name,
      field,
      existingId: holder,
      newId: id,
    });
  }
}

async function release(
  ctx: UniquenessContext,
  type: BoundType,
  field: string,
  value: unknown,
): Promise<void> {
  await ctx.backend.deleteUnique({
    serviceId: ctx.serviceId,
    kind: type.name,
    field,
    key: computeUniqueKey(value),
  });
}

/**
 * Claims the unique keys of a newly created node.
 *
 * @throws UniquenessError if another node holds one of the keys
 */
export async function insertUniquenessEntries(
  ctx: UniquenessContext,
  type: BoundType,
  id: string,
  props: Readonly<Record<string, unknown>>,
): Promise<void> {
  for (const field of declaredUniqueFields(type)) {
    const value = props[field];
    if (value === null || value === undefined) continue;
    await claim(ctx, type, field, value, id);
  }
}

/**
 * Moves the unique keys of an updated node from old to new values.
 *
 * @throws UniquenessError if another node holds one of the new keys
 */
export async function updateUniquenessEntries(
  ctx: UniquenessContext,
  type: BoundType,
  id: string,
  previous: Readonly<Record<string, unknown>>,
  next: Readonly<Record<string, unknown>>,
): Promise<void> {
  for (const field of declaredUniqueFields(type)) {
    const before = previous[field] ?? null;
    const after = next[field] ?? null;
    if (computeUniqueKey(before) === computeUniqueKey(after)) continue;

    if (before !== null) await release(ctx, type, field, before);
    if (after !== null) await claim(ctx, type, field, after, id);
  }
}

/**
 * Releases the unique keys of a node being deleted.
 */
export async function deleteUniquenessEntries(
  ctx: UniquenessContext,
  type: BoundType,
  props: Readonly<Record<string, unknown>>,
): Promise<void> {
  for (const field of declaredUniqueFields(type)) {
    const value = props[field];
    if (value === null || value === undefined) continue;
    await release(ctx, type, field, value);
  }
}
