/**
 * Row-mapping utilities for the Drizzle SQLite backend.
 */

import { DatabaseOperationError } from "../../errors/index";
import { type LinkRow, type NodeRow } from "../types";

// Trust boundary: Drizzle raw SQL returns Record<string, unknown> rows.
// Each column is checked against the shape the DDL gives it.

type RawRow = Readonly<Record<string, unknown>>;

function readString(row: RawRow, column: string, entity: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new DatabaseOperationError(
      `Expected text column "${column}" in ${entity} row`,
      { operation: "select", entity },
    );
  }
  return value;
}

export function toNodeRow(row: RawRow): NodeRow {
  return {
    service_id: readString(row, "service_id", "node"),
    kind: readString(row, "kind", "node"),
    id: readString(row, "id", "node"),
    props: readString(row, "props", "node"),
    created_at: readString(row, "created_at", "node"),
    updated_at: readString(row, "updated_at", "node"),
  };
}

export function toLinkRow(row: RawRow): LinkRow {
  return {
    service_id: readString(row, "service_id", "link"),
    relation: readString(row, "relation", "link"),
    a_kind: readString(row, "a_kind", "link"),
    a_id: readString(row, "a_id", "link"),
    b_kind: readString(row, "b_kind", "link"),
    b_id: readString(row, "b_id", "link"),
    created_at: readString(row, "created_at", "link"),
  };
}

export function toUniqueHolder(row: RawRow): string {
  return readString(row, "node_id", "unique");
}

export function toCount(row: RawRow | undefined): number {
  const value = row?.count;
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  throw new DatabaseOperationError(`Expected numeric "count" column`, {
    operation: "select",
    entity: "count",
  });
}

/**
 * Parses the JSON props column of a node row.
 */
export function parseProps(row: NodeRow): Record<string, unknown> {
  const parsed: unknown = JSON.parse(row.props);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new DatabaseOperationError(
      `Node ${row.kind}/${row.id} has malformed props`,
      { operation: "select", entity: "node" },
    );
  }
  return Object.fromEntries(Object.entries(parsed));
}
