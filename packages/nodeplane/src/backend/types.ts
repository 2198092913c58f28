/**
 * Backend interface types for Nodeplane storage.
 *
 * The backend abstracts database operations so the mutation executor and
 * resolvers never issue SQL themselves.
 */

// ============================================================
// Row Types (Database Records)
// ============================================================

/**
 * A row from the nodeplane_nodes table.
 */
export type NodeRow = Readonly<{
  service_id: string;
  kind: string;
  id: string;
  props: string; // JSON string
  created_at: string;
  updated_at: string;
}>;

/**
 * A row from the nodeplane_links table. A link joins the node on side A of
 * a relation to the node on side B.
 */
export type LinkRow = Readonly<{
  service_id: string;
  relation: string;
  a_kind: string;
  a_id: string;
  b_kind: string;
  b_id: string;
  created_at: string;
}>;

/**
 * A row from the nodeplane_uniques table.
 */
export type UniqueRow = Readonly<{
  service_id: string;
  node_kind: string;
  field: string;
  key: string;
  node_id: string;
}>;

// ============================================================
// Operation Parameters
// ============================================================

export type InsertNodeParams = Readonly<{
  serviceId: string;
  kind: string;
  id: string;
  props: Readonly<Record<string, unknown>>;
  timestamp: string;
}>;

export type UpdateNodeParams = Readonly<{
  serviceId: string;
  kind: string;
  id: string;
  props: Readonly<Record<string, unknown>>;
  timestamp: string;
}>;

export type NodeKeyParams = Readonly<{
  serviceId: string;
  kind: string;
  id: string;
}>;

export type LinkParams = Readonly<{
  serviceId: string;
  relation: string;
  aKind: string;
  aId: string;
  bKind: string;
  bId: string;
}>;

export type FindLinksParams = Readonly<{
  serviceId: string;
  relation: string;
  /** Side of the link the node sits on */
  side: "A" | "B";
  nodeId: string;
}>;

export type UniqueKeyParams = Readonly<{
  serviceId: string;
  kind: string;
  field: string;
  key: string;
}>;

export type InsertUniqueParams = UniqueKeyParams &
  Readonly<{
    nodeId: string;
  }>;

// ============================================================
// Backend Interface
// ============================================================

/**
 * Operations available both on the backend and inside a transaction.
 */
export type StoreOperations = Readonly<{
  // === Nodes ===
  insertNode: (params: InsertNodeParams) => Promise<NodeRow>;
  getNode: (params: NodeKeyParams) => Promise<NodeRow | undefined>;
  updateNode: (params: UpdateNodeParams) => Promise<NodeRow>;
  deleteNode: (params: NodeKeyParams) => Promise<void>;
  /** All nodes of a kind, ordered by id */
  listNodes: (serviceId: string, kind: string) => Promise<readonly NodeRow[]>;
  countNodes: (serviceId: string, kind: string) => Promise<number>;

  // === Links ===
  /** Inserts a link; an identical existing link is kept */
  insertLink: (params: LinkParams) => Promise<void>;
  deleteLink: (params: LinkParams) => Promise<void>;
  /** Links of a relation where the node sits on the given side */
  findLinks: (params: FindLinksParams) => Promise<readonly LinkRow[]>;

  // === Uniques ===
  /**
   * Claims a unique key for a node. Returns the node id now holding the key,
   * which differs from `nodeId` when another node already holds it.
   */
  insertUnique: (params: InsertUniqueParams) => Promise<string>;
  findUnique: (params: UniqueKeyParams) => Promise<string | undefined>;
  deleteUnique: (params: UniqueKeyParams) => Promise<void>;

  // === Maintenance ===
  /** Removes every node, link and unique key of a service */
  clearService: (serviceId: string) => Promise<void>;
}>;

/**
 * Backend handle scoped to an open transaction.
 */
export type TransactionBackend = StoreOperations;

/**
 * Storage backend for a data service.
 */
export type StoreBackend = StoreOperations &
  Readonly<{
    /**
     * Runs `fn` in a transaction. The transaction owns the store until it
     * commits or rolls back; any error rolls it back and is rethrown.
     */
    transaction: <T>(fn: (tx: TransactionBackend) => Promise<T>) => Promise<T>;
    close: () => Promise<void>;
  }>;
