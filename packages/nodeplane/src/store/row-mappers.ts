/**
 * Row Mappers for Store
 *
 * Transforms node rows into the snapshots callers see.
 */
import { type NodeRow } from "../backend/types";
import { parseProps } from "../backend/drizzle/row-mappers";
import { type NodeSnapshot } from "../core/types";
import { type BoundType } from "../schema/types";

/**
 * Converts a node row to a snapshot. Declared scalar fields without a
 * stored value read as null.
 */
export function rowToSnapshot(type: BoundType, row: NodeRow): NodeSnapshot {
  const props = parseProps(row);
  const values: Record<string, unknown> = {};

  for (const field of type.scalarFields) {
    if (field.system) continue;
    values[field.name] = props[field.name] ?? null;
  }

  return {
    ...values,
    id: row.id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Returns the declared scalar values of a snapshot, without system fields.
 */
export function snapshotProps(
  type: BoundType,
  snapshot: NodeSnapshot,
): Record<string, unknown> {
  const props: Record<string, unknown> = {};
  for (const field of type.scalarFields) {
    if (field.system) continue;
    props[field.name] = snapshot[field.name] ?? null;
  }
  return props;
}
