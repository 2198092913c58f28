/**
 * SQLite Backend Tests
 *
 * Exercises the store operations against a real in-memory database.
 */
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { beforeEach, describe, expect, it } from "vitest";

import {
  createLocalSqliteBackend,
  createSqliteBackend,
  createSqliteTables,
  generateSqliteDDL,
  getSqliteMigrationSQL,
} from "../../../src/backend/sqlite";
import type { LinkParams, StoreBackend } from "../../../src/backend/types";
import { createTestBackend } from "../../test-utils";

const SERVICE = "blog@test";
const T1 = "2024-01-15T10:30:00.000Z";
const T2 = "2024-01-16T10:30:00.000Z";

function link(aId: string, bId: string): LinkParams {
  return {
    serviceId: SERVICE,
    relation: "PostToUser",
    aKind: "Post",
    aId,
    bKind: "User",
    bId,
  };
}

describe("SQLite Backend", () => {
  let backend: StoreBackend;

  beforeEach(() => {
    backend = createTestBackend();
  });

  // ============================================================
  // Nodes
  // ============================================================

  describe("nodes", () => {
    it("inserts and reads a node", async () => {
      const row = await backend.insertNode({
        serviceId: SERVICE,
        kind: "User",
        id: "c1",
        props: { name: "Alice", age: 30 },
        timestamp: T1,
      });

      expect(row).toEqual({
        service_id: SERVICE,
        kind: "User",
        id: "c1",
        props: '{"name":"Alice","age":30}',
        created_at: T1,
        updated_at: T1,
      });
      await expect(
        backend.getNode({ serviceId: SERVICE, kind: "User", id: "c1" }),
      ).resolves.toEqual(row);
    });

    it("replaces props and moves updated_at only", async () => {
      await backend.insertNode({
        serviceId: SERVICE,
        kind: "User",
        id: "c1",
        props: { name: "Alice" },
        timestamp: T1,
      });

      const row = await backend.updateNode({
        serviceId: SERVICE,
        kind: "User",
        id: "c1",
        props: { name: "Alicia" },
        timestamp: T2,
      });

      expect(row).toMatchObject({
        props: '{"name":"Alicia"}',
        created_at: T1,
        updated_at: T2,
      });
    });

    it("fails to update a node that does not exist", async () => {
      await expect(
        backend.updateNode({
          serviceId: SERVICE,
          kind: "User",
          id: "missing",
          props: {},
          timestamp: T1,
        }),
      ).rejects.toMatchObject({ code: "DATABASE_OPERATION_ERROR" });
    });

    it("lists and counts nodes of one kind and service in id order", async () => {
      for (const id of ["c3", "c1", "c2"]) {
        await backend.insertNode({
          serviceId: SERVICE,
          kind: "User",
          id,
          props: {},
          timestamp: T1,
        });
      }
      await backend.insertNode({
        serviceId: SERVICE,
        kind: "Post",
        id: "c4",
        props: {},
        timestamp: T1,
      });
      await backend.insertNode({
        serviceId: "other@test",
        kind: "User",
        id: "c5",
        props: {},
        timestamp: T1,
      });

      const rows = await backend.listNodes(SERVICE, "User");

      expect(rows.map((row) => row.id)).toEqual(["c1", "c2", "c3"]);
      expect(await backend.countNodes(SERVICE, "User")).toBe(3);
      expect(await backend.countNodes("other@test", "User")).toBe(1);
    });

    it("deletes a node", async () => {
      const key = { serviceId: SERVICE, kind: "User", id: "c1" };
      await backend.insertNode({ ...key, props: {}, timestamp: T1 });

      await backend.deleteNode(key);

      await expect(backend.getNode(key)).resolves.toBeUndefined();
    });
  });

  // ============================================================
  // Links
  // ============================================================

  describe("links", () => {
    it("finds links from either side", async () => {
      await backend.insertLink(link("p1", "u1"));
      await backend.insertLink(link("p2", "u1"));

      const fromUser = await backend.findLinks({
        serviceId: SERVICE,
        relation: "PostToUser",
        side: "B",
        nodeId: "u1",
      });
      const fromPost = await backend.findLinks({
        serviceId: SERVICE,
        relation: "PostToUser",
        side: "A",
        nodeId: "p2",
      });

      expect(fromUser.map((row) => row.a_id)).toEqual(["p1", "p2"]);
      expect(fromPost).toHaveLength(1);
      expect(fromPost[0]).toMatchObject({ a_kind: "Post", b_kind: "User", b_id: "u1" });
    });

    it("keeps one row for a link inserted twice", async () => {
      await backend.insertLink(link("p1", "u1"));
      await backend.insertLink(link("p1", "u1"));

      const rows = await backend.findLinks({
        serviceId: SERVICE,
        relation: "PostToUser",
        side: "A",
        nodeId: "p1",
      });
      expect(rows).toHaveLength(1);
    });

    it("deletes a link", async () => {
      await backend.insertLink(link("p1", "u1"));
      await backend.deleteLink(link("p1", "u1"));

      await expect(
        backend.findLinks({
          serviceId: SERVICE,
          relation: "PostToUser",
          side: "B",
          nodeId: "u1",
        }),
      ).resolves.toEqual([]);
    });
  });

  // ============================================================
  // Uniques
  // ============================================================

  describe("uniques", () => {
    const key = {
      serviceId: SERVICE,
      kind: "User",
      field: "email",
      key: '"a@example.com"',
    };

    it("claims a free key", async () => {
      await expect(backend.insertUnique({ ...key, nodeId: "c1" })).resolves.toBe("c1");
      await expect(backend.findUnique(key)).resolves.toBe("c1");
    });

    it("reports the holder of a taken key", async () => {
      await backend.insertUnique({ ...key, nodeId: "c1" });

      await expect(backend.insertUnique({ ...key, nodeId: "c2" })).resolves.toBe("c1");
      await expect(backend.insertUnique({ ...key, nodeId: "c1" })).resolves.toBe("c1");
    });

    it("frees a key on delete", async () => {
      await backend.insertUnique({ ...key, nodeId: "c1" });
      await backend.deleteUnique(key);

      await expect(backend.findUnique(key)).resolves.toBeUndefined();
    });
  });

  // ============================================================
  // Transactions
  // ============================================================

  describe("transactions", () => {
    it("commits the work of a transaction", async () => {
      await backend.transaction(async (tx) => {
        await tx.insertNode({
          serviceId: SERVICE,
          kind: "User",
          id: "c1",
          props: {},
          timestamp: T1,
        });
      });

      expect(await backend.countNodes(SERVICE, "User")).toBe(1);
    });

    it("rolls back and rethrows when the body fails", async () => {
      const failure = new Error("stop");

      await expect(
        backend.transaction(async (tx) => {
          await tx.insertNode({
            serviceId: SERVICE,
            kind: "User",
            id: "c1",
            props: {},
            timestamp: T1,
          });
          await tx.insertLink(link("p1", "c1"));
          throw failure;
        }),
      ).rejects.toBe(failure);

      expect(await backend.countNodes(SERVICE, "User")).toBe(0);
      await expect(
        backend.findLinks({
          serviceId: SERVICE,
          relation: "PostToUser",
          side: "B",
          nodeId: "c1",
        }),
      ).resolves.toEqual([]);
    });

    it("runs overlapping transactions one after another", async () => {
      const order: string[] = [];

      await Promise.all(
        ["first", "second"].map((name) =>
          backend.transaction(async (tx) => {
            order.push(`${name}:begin`);
            await tx.countNodes(SERVICE, "User");
            order.push(`${name}:end`);
          }),
        ),
      );

      expect(order).toEqual(["first:begin", "first:end", "second:begin", "second:end"]);
    });
  });

  it("clears every row of one service", async () => {
    await backend.insertNode({
      serviceId: SERVICE,
      kind: "User",
      id: "c1",
      props: {},
      timestamp: T1,
    });
    await backend.insertNode({
      serviceId: "other@test",
      kind: "User",
      id: "c1",
      props: {},
      timestamp: T1,
    });
    await backend.insertLink(link("p1", "c1"));

    await backend.clearService(SERVICE);

    expect(await backend.countNodes(SERVICE, "User")).toBe(0);
    expect(await backend.countNodes("other@test", "User")).toBe(1);
  });
});

describe("SQLite setup", () => {
  it("creates tables and indexes", () => {
    const statements = generateSqliteDDL();

    expect(statements).toHaveLength(5);
    expect(statements[0]).toMatch(/^CREATE TABLE IF NOT EXISTS "nodeplane_nodes"/);
    expect(getSqliteMigrationSQL()).toContain('CREATE INDEX IF NOT EXISTS "nodeplane_links_b_idx"');
  });

  it("works with custom table names on a caller-managed database", async () => {
    const tables = createSqliteTables({ nodes: "blog_nodes" });
    const sqlite = new Database(":memory:");
    sqlite.exec(getSqliteMigrationSQL(tables));
    const backend = createSqliteBackend(drizzle(sqlite), { tables });

    await backend.insertNode({
      serviceId: SERVICE,
      kind: "User",
      id: "c1",
      props: {},
      timestamp: T1,
    });

    const count: unknown = sqlite.prepare('SELECT COUNT(*) AS n FROM "blog_nodes"').get();
    expect(count).toEqual({ n: 1 });
    sqlite.close();
  });

  it("closes the local database once", async () => {
    const { backend } = createLocalSqliteBackend();
    await backend.close();
    await expect(backend.close()).resolves.toBeUndefined();
  });
});
