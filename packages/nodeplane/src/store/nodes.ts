/**
 * Node reads and writes shared by the selector, the resolvers and the
 * mutation executor.
 */
import { type NodeSnapshot } from "../core/types";
import { UniquenessError } from "../errors/index";
import { getBoundType } from "../schema/binder";
import { type BoundType } from "../schema/types";
import { rowToSnapshot, snapshotProps } from "./row-mappers";
import { type StoreContext } from "./types";
import {
  deleteUniquenessEntries,
  insertUniquenessEntries,
  updateUniquenessEntries,
} from "./uniqueness";

// ============================================================
// Reads
// ============================================================

export async function readNode(
  ctx: StoreContext,
  typeName: string,
  id: string,
): Promise<NodeSnapshot | undefined> {
  const type = getBoundType(ctx.schema, typeName);
  const row = await ctx.backend.getNode({
    serviceId: ctx.schema.id,
    kind: typeName,
    id,
  });
  return row === undefined ? undefined : rowToSnapshot(type, row);
}

/**
 * Every node of a type, in id order.
 */
export async function listNodes(
  ctx: StoreContext,
  typeName: string,
): Promise<NodeSnapshot[]> {
  const type = getBoundType(ctx.schema, typeName);
  const rows = await ctx.backend.listNodes(ctx.schema.id, typeName);
  return rows.map((row) => rowToSnapshot(type, row));
}

// ============================================================
// Writes
// ============================================================

/**
 * Inserts a node and claims its unique keys.
 *
 * @throws UniquenessError if the id or a unique value is taken
 */
export async function insertNode(
  ctx: StoreContext,
  type: BoundType,
  id: string,
  props: Readonly<Record<string, unknown>>,
  timestamp: string,
): Promise<NodeSnapshot> {
  const existing = await ctx.backend.getNode({
    serviceId: ctx.schema.id,
    kind: type.name,
    id,
  });
  if (existing !== undefined) {
    throw new UniquenessError({
      type: type.name,
      field: "id",
      existingId: id,
      newId: id,
    });
  }

  const row = await ctx.backend.insertNode({
    serviceId: ctx.schema.id,
    kind: type.name,
    id,
    props,
    timestamp,
  });
  await insertUniquenessEntries(
    { serviceId: ctx.schema.id, backend: ctx.backend },
    type,
    id,
    props,
  );
  return rowToSnapshot(type, row);
}

/**
 * Replaces a node's props and moves its unique keys.
 *
 * @throws UniquenessError if a new unique value is taken
 */
export async function updateNode(
  ctx: StoreContext,
  type: BoundType,
  previous: NodeSnapshot,
  props: Readonly<Record<string, unknown>>,
  timestamp: string,
): Promise<NodeSnapshot> {
  await updateUniquenessEntries(
    { serviceId: ctx.schema.id, backend: ctx.backend },
    type,
    previous.id,
    snapshotProps(type, previous),
    props,
  );
  const row = await ctx.backend.updateNode({
    serviceId: ctx.schema.id,
    kind: type.name,
    id: previous.id,
    props,
    timestamp,
  });
  return rowToSnapshot(type, row);
}

/**
 * Removes a node row and its unique keys. Links are the caller's concern.
 */
export async function removeNode(
  ctx: StoreContext,
  type: BoundType,
  snapshot: NodeSnapshot,
): Promise<void> {
  await deleteUniquenessEntries(
    { serviceId: ctx.schema.id, backend: ctx.backend },
    type,
    snapshotProps(type, snapshot),
  );
  await ctx.backend.deleteNode({
    serviceId: ctx.schema.id,
    kind: type.name,
    id: snapshot.id,
  });
}
