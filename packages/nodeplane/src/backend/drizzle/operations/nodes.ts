import { type SQL, sql } from "drizzle-orm";

import type {
  InsertNodeParams,
  NodeKeyParams,
  UpdateNodeParams,
} from "../../types";
import { columnList, quotedColumn, type Tables } from "./shared";

/**
 * Builds an INSERT query for a node.
 */
export function buildInsertNode(tables: Tables, params: InsertNodeParams): SQL {
  const { nodes } = tables;
  const columns = columnList([
    nodes.serviceId,
    nodes.kind,
    nodes.id,
    nodes.props,
    nodes.createdAt,
    nodes.updatedAt,
  ]);

  return sql`
    INSERT INTO ${nodes} (${columns})
    VALUES (
      ${params.serviceId}, ${params.kind}, ${params.id},
      ${JSON.stringify(params.props)}, ${params.timestamp}, ${params.timestamp}
    )
    RETURNING *
  `;
}

/**
 * Builds a SELECT query for a single node.
 */
export function buildGetNode(tables: Tables, params: NodeKeyParams): SQL {
  const { nodes } = tables;

  return sql`
    SELECT * FROM ${nodes}
    WHERE ${nodes.serviceId} = ${params.serviceId}
      AND ${nodes.kind} = ${params.kind}
      AND ${nodes.id} = ${params.id}
  `;
}

/**
 * Builds an UPDATE query replacing a node's props.
 * Uses raw column names in the SET clause.
 */
export function buildUpdateNode(tables: Tables, params: UpdateNodeParams): SQL {
  const { nodes } = tables;

  return sql`
    UPDATE ${nodes}
    SET ${quotedColumn(nodes.props)} = ${JSON.stringify(params.props)},
        ${quotedColumn(nodes.updatedAt)} = ${params.timestamp}
    WHERE ${nodes.serviceId} = ${params.serviceId}
      AND ${nodes.kind} = ${params.kind}
      AND ${nodes.id} = ${params.id}
    RETURNING *
  `;
}

/**
 * Builds a hard DELETE query for a node.
 */
export function buildDeleteNode(tables: Tables, params: NodeKeyParams): SQL {
  const { nodes } = tables;

  return sql`
    DELETE FROM ${nodes}
    WHERE ${nodes.serviceId} = ${params.serviceId}
      AND ${nodes.kind} = ${params.kind}
      AND ${nodes.id} = ${params.id}
  `;
}

/**
 * Builds a SELECT query for every node of a kind, in id order.
 */
export function buildListNodes(
  tables: Tables,
  serviceId: string,
  kind: string,
): SQL {
  const { nodes } = tables;

  return sql`
    SELECT * FROM ${nodes}
    WHERE ${nodes.serviceId} = ${serviceId}
      AND ${nodes.kind} = ${kind}
    ORDER BY ${nodes.id} ASC
  `;
}

export function buildCountNodes(
  tables: Tables,
  serviceId: string,
  kind: string,
): SQL {
  const { nodes } = tables;

  return sql`
    SELECT COUNT(*) AS count FROM ${nodes}
    WHERE ${nodes.serviceId} = ${serviceId}
      AND ${nodes.kind} = ${kind}
  `;
}
