import { type SQL, sql } from "drizzle-orm";

import type { SqliteTables } from "../schema/sqlite";

export type Tables = SqliteTables;

export function quotedColumn(column: { name: string }): SQL {
  return sql.raw(`"${column.name.replaceAll('"', '""')}"`);
}

/**
 * Raw column list for INSERT statements (qualified names are not allowed there).
 */
export function columnList(columns: readonly { name: string }[]): SQL {
  return sql.join(
    columns.map((column) => quotedColumn(column)),
    sql`, `,
  );
}
