import { type SQL, sql } from "drizzle-orm";

import type { FindLinksParams, LinkParams } from "../../types";
import { columnList, type Tables } from "./shared";

/**
 * Builds an INSERT query for a link. Inserting a link that already exists
 * is a no-op.
 */
export function buildInsertLink(
  tables: Tables,
  params: LinkParams,
  timestamp: string,
): SQL {
  const { links } = tables;
  const columns = columnList([
    links.serviceId,
    links.relation,
    links.aKind,
    links.aId,
    links.bKind,
    links.bId,
    links.createdAt,
  ]);
  const conflictColumns = columnList([
    links.serviceId,
    links.relation,
    links.aId,
    links.bId,
  ]);

  return sql`
    INSERT INTO ${links} (${columns})
    VALUES (
      ${params.serviceId}, ${params.relation},
      ${params.aKind}, ${params.aId}, ${params.bKind}, ${params.bId},
      ${timestamp}
    )
    ON CONFLICT (${conflictColumns}) DO NOTHING
  `;
}

export function buildDeleteLink(tables: Tables, params: LinkParams): SQL {
  const { links } = tables;

  return sql`
    DELETE FROM ${links}
    WHERE ${links.serviceId} = ${params.serviceId}
      AND ${links.relation} = ${params.relation}
      AND ${links.aId} = ${params.aId}
      AND ${links.bId} = ${params.bId}
  `;
}

/**
 * Builds a SELECT query for the links of a relation that have the node on
 * the given side, in the order they were created.
 */
export function buildFindLinks(tables: Tables, params: FindLinksParams): SQL {
  const { links } = tables;
  const nodeColumn = params.side === "A" ? links.aId : links.bId;

  return sql`
    SELECT * FROM ${links}
    WHERE ${links.serviceId} = ${params.serviceId}
      AND ${links.relation} = ${params.relation}
      AND ${nodeColumn} = ${params.nodeId}
    ORDER BY ${links.createdAt} ASC, ${links.aId} ASC, ${links.bId} ASC
  `;
}
