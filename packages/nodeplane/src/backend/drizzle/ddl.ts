/**
 * DDL generation for the SQLite backend.
 *
 * Statements are derived from the Drizzle table definitions so the tables a
 * local backend creates always match the ones the queries address.
 */
import { is } from "drizzle-orm";
import {
  getTableConfig,
  SQLiteColumn,
  type SQLiteTable,
} from "drizzle-orm/sqlite-core";

import { ConfigurationError } from "../../errors/index";
import { type SqliteTables, tables as defaultTables } from "./schema/sqlite";

/**
 * Maps Drizzle column types to SQLite types.
 */
function getSqliteColumnType(column: SQLiteColumn): string {
  switch (column.columnType) {
    case "SQLiteInteger": {
      return "INTEGER";
    }
    case "SQLiteReal": {
      return "REAL";
    }
    case "SQLiteBlob": {
      return "BLOB";
    }
    default: {
      return "TEXT";
    }
  }
}

function generateCreateTableSQL(table: SQLiteTable): string {
  const config = getTableConfig(table);
  const columnDefs = config.columns.map((column) =>
    [
      `"${column.name}"`,
      getSqliteColumnType(column),
      ...(column.notNull ? ["NOT NULL"] : []),
    ].join(" "),
  );

  const pk = config.primaryKeys[0];
  if (pk) {
    const pkColumns = pk.columns.map((c) => `"${c.name}"`).join(", ");
    columnDefs.push(`PRIMARY KEY (${pkColumns})`);
  }

  return `CREATE TABLE IF NOT EXISTS "${config.name}" (\n  ${columnDefs.join(",\n  ")}\n);`;
}

function generateCreateIndexSQL(table: SQLiteTable): string[] {
  const config = getTableConfig(table);

  return config.indexes.map((index) => {
    const indexConfig = index.config;
    const columns = indexConfig.columns.map((column) => {
      if (is(column, SQLiteColumn)) return `"${column.name}"`;
      throw new ConfigurationError(
        `Index "${indexConfig.name}" uses an expression column, which DDL generation does not support`,
        { table: config.name, index: indexConfig.name },
      );
    });
    const unique = indexConfig.unique ? "UNIQUE " : "";
    return `CREATE ${unique}INDEX IF NOT EXISTS "${indexConfig.name}" ON "${config.name}" (${columns.join(", ")});`;
  });
}

/**
 * Generates all DDL statements for the given SQLite tables.
 */
export function generateSqliteDDL(
  tables: SqliteTables = defaultTables,
): string[] {
  const all: readonly SQLiteTable[] = [tables.nodes, tables.links, tables.uniques];

  // Tables first, then indexes
  return [
    ...all.map((table) => generateCreateTableSQL(table)),
    ...all.flatMap((table) => generateCreateIndexSQL(table)),
  ];
}

/**
 * Generates a single SQL string for SQLite migrations.
 */
export function getSqliteMigrationSQL(
  tables: SqliteTables = defaultTables,
): string {
  return generateSqliteDDL(tables).join("\n\n");
}
