/**
 * SQLite backend for Nodeplane.
 *
 * @example Quick start with in-memory database
 * ```typescript
 * import { createLocalSqliteBackend } from "nodeplane/sqlite";
 *
 * const { backend } = createLocalSqliteBackend();
 * const service = createService({ schema, backend, auth });
 * ```
 *
 * @example File-based database for persistent local development
 * ```typescript
 * const { backend } = createLocalSqliteBackend({ path: "./dev.db" });
 * ```
 */
import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";

import { ConfigurationError } from "../../errors/index";
import { generateSqliteDDL } from "../drizzle/ddl";
import {
  createSqliteBackend,
  type SqliteTables,
  tables as defaultTables,
} from "../drizzle/sqlite";
import type { StoreBackend } from "../types";

type NodeModuleVersionMismatch = Readonly<{
  compiled: number;
  required: number;
}>;

function getUnknownErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function parseNodeModuleVersionMismatchMessage(
  message: string,
): NodeModuleVersionMismatch | undefined {
  const regexp =
    /NODE_MODULE_VERSION (?<compiled>\d+)[\s\S]*?NODE_MODULE_VERSION (?<required>\d+)/;
  const match = regexp.exec(message);
  if (!match?.groups) return undefined;

  const compiled = Number(match.groups.compiled);
  const required = Number(match.groups.required);

  if (!Number.isFinite(compiled) || !Number.isFinite(required))
    return undefined;

  return { compiled, required };
}

function createDatabase(path: string): Database.Database {
  try {
    return new Database(path);
  } catch (error) {
    const message = getUnknownErrorMessage(error);
    const mismatch = parseNodeModuleVersionMismatchMessage(message);
    if (!mismatch) {
      throw new ConfigurationError(
        `Failed to open SQLite database at "${path}": ${message}`,
        { path },
        { cause: error },
      );
    }

    throw new ConfigurationError(
      [
        "Failed to load better-sqlite3 native addon.",
        `It was compiled for NODE_MODULE_VERSION ${mismatch.compiled}, but this Node.js runtime requires ${mismatch.required}.`,
        "Rebuild with: npm rebuild better-sqlite3.",
      ].join(" "),
      {
        nodeVersion: process.version,
        compiledNodeModuleVersion: mismatch.compiled,
        requiredNodeModuleVersion: mismatch.required,
      },
      { cause: error },
    );
  }
}

// ============================================================
// Types
// ============================================================

/**
 * Options for creating a local SQLite backend.
 */
export type LocalSqliteBackendOptions = Readonly<{
  /**
   * Path to the SQLite database file.
   * Defaults to ":memory:" for an in-memory database.
   */
  path?: string;

  /**
   * Custom table definitions.
   * Defaults to standard Nodeplane table names.
   */
  tables?: SqliteTables;
}>;

/**
 * Result of creating a local SQLite backend.
 */
export type LocalSqliteBackendResult = Readonly<{
  backend: StoreBackend;

  /**
   * The underlying Drizzle database instance.
   * Useful for direct SQL access in tests.
   */
  db: BetterSQLite3Database;
}>;

// ============================================================
// Factory Function
// ============================================================

/**
 * Creates a SQLite backend with minimal configuration: opens the database,
 * creates the tables and wires the backend. `close()` closes the database.
 */
export function createLocalSqliteBackend(
  options: LocalSqliteBackendOptions = {},
): LocalSqliteBackendResult {
  const path = options.path ?? ":memory:";
  const tables = options.tables ?? defaultTables;

  const sqlite = createDatabase(path);
  const db = drizzle(sqlite);

  for (const statement of generateSqliteDDL(tables)) {
    sqlite.exec(statement);
  }

  const backend = createSqliteBackend(db, { tables });
  let isClosed = false;

  function close(): Promise<void> {
    if (isClosed) return Promise.resolve();
    isClosed = true;
    sqlite.close();
    return Promise.resolve();
  }

  const managedBackend: StoreBackend = { ...backend, close };

  return { backend: managedBackend, db };
}

// ============================================================
// Re-exports
// ============================================================

export {
  createSqliteBackend,
  createSqliteTables,
  type SqliteBackendOptions,
  type SqliteTables,
  type SyncSqliteDatabase,
  tables,
} from "../drizzle/sqlite";

export { generateSqliteDDL, getSqliteMigrationSQL } from "../drizzle/ddl";
