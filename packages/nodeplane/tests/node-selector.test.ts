import { beforeEach, describe, expect, it } from "vitest";

import { SelectorError } from "../src/errors";
import {
  findUnique,
  parseUniqueSelector,
  selectMany,
  selectUnique,
} from "../src/selector/node-selector";
import { compileFilter } from "../src/selector/where";
import {
  type BlogFixture,
  createBlogFixture,
  type SeededBlog,
  seedBlog,
  thrownBy,
} from "./test-utils";

describe("Node Selector", () => {
  let fixture: BlogFixture;
  let seeded: SeededBlog;

  beforeEach(async () => {
    fixture = createBlogFixture();
    seeded = await seedBlog(fixture.executor);
  });

  async function names(where: unknown): Promise<unknown[]> {
    const users = await selectMany(fixture.ctx, "User", where);
    return users.map((user) => user.name);
  }

  async function titles(where: unknown): Promise<unknown[]> {
    const posts = await selectMany(fixture.ctx, "Post", where);
    return posts.map((post) => post.title);
  }

  describe("unique selectors", () => {
    it("finds a node by id", async () => {
      const node = await findUnique(fixture.ctx, "User", { id: seeded.bob });
      expect(node?.email).toBe("bob@example.com");
    });

    it("finds a node by a unique field", async () => {
      const node = await findUnique(fixture.ctx, "User", {
        email: "carol@test.org",
      });
      expect(node?.id).toBe(seeded.carol);
    });

    it("returns undefined when nothing matches", async () => {
      await expect(
        findUnique(fixture.ctx, "User", { email: "nobody@example.com" }),
      ).resolves.toBeUndefined();
    });

    it("fails with NODE_NOT_FOUND when one node is required", async () => {
      await expect(
        selectUnique(fixture.ctx, "User", { id: "cmissing" }),
      ).rejects.toMatchObject({
        name: "SelectorError",
        code: "NODE_NOT_FOUND",
        details: { type: "User", where: { id: "cmissing" } },
      });
    });

    it("ignores undefined keys", async () => {
      const node = await selectUnique(fixture.ctx, "User", {
        id: undefined,
        email: "alice@example.com",
      });
      expect(node.id).toBe(seeded.alice);
    });

    it.each([
      [{}, "INVALID_SELECTOR"],
      [{ id: "a", email: "b" }, "INVALID_SELECTOR"],
      [{ name: "Alice" }, "NON_UNIQUE_SELECTOR"],
      [{ posts: "x" }, "NON_UNIQUE_SELECTOR"],
      [{ email: null }, "INVALID_SELECTOR"],
      [{ email: 42 }, "INVALID_SELECTOR"],
    ])("rejects %j with %s", (where, code) => {
      const type = fixture.schema.types.get("User");
      if (type === undefined) throw new Error("User is not bound");

      const error = thrownBy(() => parseUniqueSelector(type, where));
      expect(error).toBeInstanceOf(SelectorError);
      expect(error).toMatchObject({ code });
    });
  });

  describe("filters", () => {
    it("selects every node for an empty or absent filter", async () => {
      expect(await names(undefined)).toEqual(["Alice", "Bob", "Carol"]);
      expect(await names({})).toEqual(["Alice", "Bob", "Carol"]);
    });

    it("matches equality, null and lists of values", async () => {
      expect(await names({ role: "ADMIN" })).toEqual(["Alice"]);
      expect(await names({ age: null })).toEqual(["Carol"]);
      expect(await names({ name_in: ["Alice", "Zed"] })).toEqual(["Alice"]);
      expect(await names({ name_not_in: ["Alice"] })).toEqual(["Bob", "Carol"]);
      expect(await names({ role_not: "ADMIN" })).toEqual(["Bob", "Carol"]);
    });

    it("compares ordered values and skips nulls", async () => {
      expect(await names({ age_gt: 26 })).toEqual(["Alice"]);
      expect(await names({ age_lte: 30 })).toEqual(["Alice", "Bob"]);
      expect(await titles({ views_gte: 3, published: true })).toEqual([
        "Hello world",
        "Bob's post",
      ]);
    });

    it("matches string operators", async () => {
      expect(await names({ email_ends_with: "@example.com" })).toEqual([
        "Alice",
        "Bob",
      ]);
      expect(await names({ email_not_ends_with: "@example.com" })).toEqual([
        "Carol",
      ]);
      expect(await titles({ title_starts_with: "H" })).toEqual(["Hello world"]);
      expect(await titles({ title_contains: "post" })).toEqual(["Bob's post"]);
      expect(await titles({ title_not_contains: "o" })).toEqual(["Draft"]);
      expect(await names({ role_starts_with: "ADM" })).toEqual(["Alice"]);
    });

    it("combines filters with AND, OR and NOT", async () => {
      expect(await names({ OR: [{ name: "Bob" }, { name: "Carol" }] })).toEqual([
        "Bob",
        "Carol",
      ]);
      expect(await names({ NOT: { name: "Bob" } })).toEqual(["Alice", "Carol"]);
      expect(
        await names({ AND: [{ age_gt: 20 }, { email_contains: "bob" }] }),
      ).toEqual(["Bob"]);
    });

    it("filters through list relations", async () => {
      expect(await names({ posts_some: { published: true } })).toEqual([
        "Alice",
        "Bob",
      ]);
      expect(await names({ posts_every: { published: true } })).toEqual([
        "Bob",
        "Carol",
      ]);
      expect(await names({ posts_none: { published: true } })).toEqual(["Carol"]);
    });

    it("filters through single relations", async () => {
      expect(await names({ profile: null })).toEqual(["Alice", "Bob"]);
      expect(await names({ profile: { bio: "hi" } })).toEqual(["Carol"]);
      expect(await titles({ author: { name: "Bob" } })).toEqual(["Bob's post"]);
    });

    it("returns nothing without failing when nothing matches", async () => {
      expect(await names({ name: "Zed" })).toEqual([]);
    });

    it.each([
      [{ nickname: "x" }, /has no field "nickname"/],
      [{ name_like: "x" }, /unknown operator "_like"/],
      [{ age: "old" }, /expected a Int value/],
      [{ name_in: "Alice" }, /expected a list of values/],
      [{ posts: {} }, /list relations are filtered with _some/],
      [{ profile_some: {} }, /_some only applies to list relations/],
      [{ age_contains: "3" }, /only applies to String fields/],
      [{ role: "OWNER" }, /expected one of ADMIN, MEMBER/],
      [{ role_not_in: ["MEMBER", "OWNER"] }, /expected one of ADMIN, MEMBER/],
    ])("rejects %j", (where, message) => {
      const error = thrownBy(() => compileFilter(fixture.schema, "User", where));
      expect(error).toBeInstanceOf(SelectorError);
      expect(error).toMatchObject({ code: "INVALID_FILTER" });
      expect(String(error)).toMatch(message);
    });

    it("rejects ordering on unordered types", () => {
      const error = thrownBy(() =>
        compileFilter(fixture.schema, "Post", { published_gt: true }),
      );
      expect(error).toMatchObject({ code: "INVALID_FILTER" });
    });
  });
});
