import { type SQL, sql } from "drizzle-orm";

import type { InsertUniqueParams, UniqueKeyParams } from "../../types";
import { columnList, quotedColumn, type Tables } from "./shared";

/**
 * Builds an INSERT query for a uniqueness entry.
 *
 * On conflict the entry is only rewritten when it already belongs to the
 * same node; if a different node holds the key the row is left unchanged,
 * and RETURNING shows the holder's node_id.
 */
export function buildInsertUnique(
  tables: Tables,
  params: InsertUniqueParams,
): SQL {
  const { uniques } = tables;
  const columns = columnList([
    uniques.serviceId,
    uniques.nodeKind,
    uniques.field,
    uniques.key,
    uniques.nodeId,
  ]);
  const conflictColumns = columnList([
    uniques.serviceId,
    uniques.nodeKind,
    uniques.field,
    uniques.key,
  ]);

  return sql`
    INSERT INTO ${uniques} (${columns})
    VALUES (
      ${params.serviceId}, ${params.kind}, ${params.field},
      ${params.key}, ${params.nodeId}
    )
    ON CONFLICT (${conflictColumns})
    DO UPDATE SET
      ${quotedColumn(uniques.nodeId)} = ${quotedColumn(uniques.nodeId)}
    RETURNING ${quotedColumn(uniques.nodeId)} as node_id
  `;
}

export function buildFindUnique(tables: Tables, params: UniqueKeyParams): SQL {
  const { uniques } = tables;

  return sql`
    SELECT ${quotedColumn(uniques.nodeId)} as node_id FROM ${uniques}
    WHERE ${uniques.serviceId} = ${params.serviceId}
      AND ${uniques.nodeKind} = ${params.kind}
      AND ${uniques.field} = ${params.field}
      AND ${uniques.key} = ${params.key}
  `;
}

export function buildDeleteUnique(
  tables: Tables,
  params: UniqueKeyParams,
): SQL {
  const { uniques } = tables;

  return sql`
    DELETE FROM ${uniques}
    WHERE ${uniques.serviceId} = ${params.serviceId}
      AND ${uniques.nodeKind} = ${params.kind}
      AND ${uniques.field} = ${params.field}
      AND ${uniques.key} = ${params.key}
  `;
}

/**
 * Builds DELETE statements for every table, filtered by service.
 */
export function buildClearService(
  tables: Tables,
  serviceId: string,
): readonly SQL[] {
  return [
    sql`DELETE FROM ${tables.uniques} WHERE ${tables.uniques.serviceId} = ${serviceId}`,
    sql`DELETE FROM ${tables.links} WHERE ${tables.links.serviceId} = ${serviceId}`,
    sql`DELETE FROM ${tables.nodes} WHERE ${tables.nodes.serviceId} = ${serviceId}`,
  ];
}
