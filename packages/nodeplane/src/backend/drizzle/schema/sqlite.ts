/**
 * Drizzle SQLite schema for Nodeplane.
 *
 * Provides table definitions that can be customized via the factory function.
 *
 * @example
 * ```typescript
 * // Default table names
 * import { tables } from "nodeplane/sqlite";
 *
 * // Custom table names
 * const tables = createSqliteTables({
 *   nodes: "blog_nodes",
 *   links: "blog_links",
 * });
 * ```
 */
import { index, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Table name configuration.
 */
export type TableNames = Readonly<{
  nodes: string;
  links: string;
  uniques: string;
}>;

const DEFAULT_TABLE_NAMES: TableNames = {
  nodes: "nodeplane_nodes",
  links: "nodeplane_links",
  uniques: "nodeplane_uniques",
};

/**
 * Creates SQLite table definitions with customizable table names.
 * Index names are derived from table names.
 */
export function createSqliteTables(names: Partial<TableNames> = {}) {
  const n: TableNames = { ...DEFAULT_TABLE_NAMES, ...names };

  const nodes = sqliteTable(
    n.nodes,
    {
      serviceId: text("service_id").notNull(),
      kind: text("kind").notNull(),
      id: text("id").notNull(),
      props: text("props").notNull(),
      createdAt: text("created_at").notNull(),
      updatedAt: text("updated_at").notNull(),
    },
    (t) => [
      primaryKey({ columns: [t.serviceId, t.kind, t.id] }),
    ],
  );

  const links = sqliteTable(
    n.links,
    {
      serviceId: text("service_id").notNull(),
      relation: text("relation").notNull(),
      aKind: text("a_kind").notNull(),
      aId: text("a_id").notNull(),
      bKind: text("b_kind").notNull(),
      bId: text("b_id").notNull(),
      createdAt: text("created_at").notNull(),
    },
    (t) => [
      primaryKey({ columns: [t.serviceId, t.relation, t.aId, t.bId] }),
      index(`${n.links}_b_idx`).on(t.serviceId, t.relation, t.bId),
    ],
  );

  const uniques = sqliteTable(
    n.uniques,
    {
      serviceId: text("service_id").notNull(),
      nodeKind: text("node_kind").notNull(),
      field: text("field").notNull(),
      key: text("key").notNull(),
      nodeId: text("node_id").notNull(),
    },
    (t) => [
      primaryKey({ columns: [t.serviceId, t.nodeKind, t.field, t.key] }),
      index(`${n.uniques}_node_idx`).on(t.serviceId, t.nodeKind, t.nodeId),
    ],
  );

  return { nodes, links, uniques } as const;
}

/**
 * Default tables with standard Nodeplane table names.
 */
export const tables = createSqliteTables();

/**
 * Type representing the tables object returned by createSqliteTables.
 */
export type SqliteTables = ReturnType<typeof createSqliteTables>;

export type NodesTable = SqliteTables["nodes"];

export type LinksTable = SqliteTables["links"];

export type UniquesTable = SqliteTables["uniques"];
