/**
 * SQLite backend adapter for Nodeplane.
 *
 * Works with synchronous Drizzle SQLite drivers (better-sqlite3).
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/better-sqlite3";
 * import Database from "better-sqlite3";
 * import { createSqliteBackend, getSqliteMigrationSQL } from "nodeplane/sqlite";
 *
 * const sqlite = new Database("app.db");
 * sqlite.exec(getSqliteMigrationSQL());
 * const backend = createSqliteBackend(drizzle(sqlite));
 * ```
 */
import { type SQL, sql } from "drizzle-orm";
import { type BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

import { DatabaseOperationError } from "../../errors/index";
import { nowIso } from "../../utils/date";
import {
  type StoreBackend,
  type StoreOperations,
  type TransactionBackend,
} from "../types";
import { buildDeleteLink, buildFindLinks, buildInsertLink } from "./operations/links";
import {
  buildCountNodes,
  buildDeleteNode,
  buildGetNode,
  buildInsertNode,
  buildListNodes,
  buildUpdateNode,
} from "./operations/nodes";
import {
  buildClearService,
  buildDeleteUnique,
  buildFindUnique,
  buildInsertUnique,
} from "./operations/uniques";
import { toCount, toLinkRow, toNodeRow, toUniqueHolder } from "./row-mappers";
import { type SqliteTables, tables as defaultTables } from "./schema/sqlite";

// ============================================================
// Types
// ============================================================

export type SyncSqliteDatabase = BaseSQLiteDatabase<"sync", unknown>;

/**
 * Options for creating a SQLite backend.
 */
export type SqliteBackendOptions = Readonly<{
  /**
   * Custom table definitions. Use createSqliteTables() to customize table names.
   * Defaults to standard Nodeplane table names.
   */
  tables?: SqliteTables;
}>;

type SerializedExecutionQueue = Readonly<{
  runExclusive: <T>(task: () => Promise<T>) => Promise<T>;
}>;

type RawRow = Record<string, unknown>;

// ============================================================
// Utilities
// ============================================================

function createSerializedExecutionQueue(): SerializedExecutionQueue {
  let tail: Promise<unknown> = Promise.resolve();

  return {
    async runExclusive<T>(task: () => Promise<T>): Promise<T> {
      const runTask = async (): Promise<T> => task();
      const result = tail.then(runTask, runTask);
      tail = result.then(
        () => 0,
        () => 0,
      );
      return result;
    },
  };
}

async function runWithSerializedQueue<T>(
  queue: SerializedExecutionQueue | undefined,
  task: () => Promise<T>,
): Promise<T> {
  if (queue === undefined) return task();
  return queue.runExclusive(task);
}

function requireRow(row: RawRow | undefined, operation: string): RawRow {
  if (row === undefined) {
    throw new DatabaseOperationError(`${operation} returned no row`, {
      operation,
      entity: "node",
    });
  }
  return row;
}

// ============================================================
// Operation Backend
// ============================================================

type CreateSqliteOperationBackendOptions = Readonly<{
  db: SyncSqliteDatabase;
  tables: SqliteTables;
  serializedQueue?: SerializedExecutionQueue;
}>;

function createSqliteOperationBackend(
  options: CreateSqliteOperationBackendOptions,
): StoreOperations {
  const { db, tables, serializedQueue } = options;

  async function execGet(query: SQL): Promise<RawRow | undefined> {
    return runWithSerializedQueue(serializedQueue, async () =>
      db.get<RawRow | undefined>(query),
    );
  }

  async function execAll(query: SQL): Promise<RawRow[]> {
    return runWithSerializedQueue(serializedQueue, async () =>
      db.all<RawRow>(query),
    );
  }

  async function execRun(query: SQL): Promise<void> {
    await runWithSerializedQueue(serializedQueue, async () => {
      db.run(query);
    });
  }

  return {
    // === Nodes ===

    async insertNode(params) {
      const row = await execGet(buildInsertNode(tables, params));
      return toNodeRow(requireRow(row, "insertNode"));
    },

    async getNode(params) {
      const row = await execGet(buildGetNode(tables, params));
      return row === undefined ? undefined : toNodeRow(row);
    },

    async updateNode(params) {
      const row = await execGet(buildUpdateNode(tables, params));
      return toNodeRow(requireRow(row, "updateNode"));
    },

    async deleteNode(params) {
      await execRun(buildDeleteNode(tables, params));
    },

    async listNodes(serviceId, kind) {
      const rows = await execAll(buildListNodes(tables, serviceId, kind));
      return rows.map((row) => toNodeRow(row));
    },

    async countNodes(serviceId, kind) {
      return toCount(await execGet(buildCountNodes(tables, serviceId, kind)));
    },

    // === Links ===

    async insertLink(params) {
      await execRun(buildInsertLink(tables, params, nowIso()));
    },

    async deleteLink(params) {
      await execRun(buildDeleteLink(tables, params));
    },

    async findLinks(params) {
      const rows = await execAll(buildFindLinks(tables, params));
      return rows.map((row) => toLinkRow(row));
    },

    // === Uniques ===

    async insertUnique(params) {
      const row = await execGet(buildInsertUnique(tables, params));
      return toUniqueHolder(requireRow(row, "insertUnique"));
    },

    async findUnique(params) {
      const row = await execGet(buildFindUnique(tables, params));
      return row === undefined ? undefined : toUniqueHolder(row);
    },

    async deleteUnique(params) {
      await execRun(buildDeleteUnique(tables, params));
    },

    // === Maintenance ===

    async clearService(serviceId) {
      for (const statement of buildClearService(tables, serviceId)) {
        await execRun(statement);
      }
    },
  };
}

// ============================================================
// Backend Factory
// ============================================================

/**
 * Creates a Nodeplane backend for a synchronous SQLite database.
 *
 * Every call, and every transaction as a whole, runs through one serialized
 * queue: a transaction owns the connection from BEGIN to COMMIT, and no
 * other caller observes its intermediate state.
 */
export function createSqliteBackend(
  db: SyncSqliteDatabase,
  options: SqliteBackendOptions = {},
): StoreBackend {
  const tables = options.tables ?? defaultTables;
  const serializedQueue = createSerializedExecutionQueue();
  const operations = createSqliteOperationBackend({
    db,
    tables,
    serializedQueue,
  });

  return {
    ...operations,

    async transaction<T>(
      fn: (tx: TransactionBackend) => Promise<T>,
    ): Promise<T> {
      return runWithSerializedQueue(serializedQueue, async () => {
        // Runs inside the queue task, so it must not queue again
        const txBackend = createSqliteOperationBackend({ db, tables });
        db.run(sql`BEGIN`);

        try {
          const result = await fn(txBackend);
          db.run(sql`COMMIT`);
          return result;
        } catch (error) {
          db.run(sql`ROLLBACK`);
          throw error;
        }
      });
    },

    async close(): Promise<void> {
      // Drizzle doesn't expose a close method
      // Users manage connection lifecycle themselves
    },
  };
}

// Re-export schema utilities
export type { SqliteTables, TableNames } from "./schema/sqlite";
export { createSqliteTables, tables } from "./schema/sqlite";
