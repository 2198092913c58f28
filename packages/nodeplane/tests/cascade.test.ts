import { beforeEach, describe, expect, it } from "vitest";

import { defineType } from "../src/core/define-type";
import { relation, scalar } from "../src/core/field";
import { createChangeFeed, type ChangeEvent } from "../src/events/change-feed";
import { createMutationExecutor } from "../src/mutation/executor";
import { bindSchema } from "../src/schema/binder";
import { findUnique, selectMany } from "../src/selector/node-selector";
import {
  type BlogFixture,
  createBlogFixture,
  createTestBackend,
  type SeededBlog,
  seedBlog,
} from "./test-utils";

describe("Cascade Resolver", () => {
  let fixture: BlogFixture;
  let seeded: SeededBlog;

  beforeEach(async () => {
    fixture = createBlogFixture();
    seeded = await seedBlog(fixture.executor);
    fixture.events.splice(0);
  });

  async function count(type: string): Promise<number> {
    return fixture.backend.countNodes(fixture.schema.id, type);
  }

  function deletedTypes(events: readonly ChangeEvent[]): string[] {
    return events.map((event) => `${event.mutation} ${event.type}`);
  }

  it("deletes dependents through CASCADE ends, breadth first", async () => {
    await fixture.executor.update(
      "Post",
      { id: await postId("Hello world") },
      { comments: { create: [{ text: "Nice" }] } },
    );
    fixture.events.splice(0);

    await fixture.executor.delete("User", { id: seeded.alice });

    expect(deletedTypes(fixture.events)).toEqual([
      "DELETED User",
      "DELETED Post",
      "DELETED Post",
      "DELETED Comment",
    ]);
    expect(fixture.events.map((event) => event.previousValues?.title)).toEqual([
      undefined,
      "Hello world",
      "Draft",
      undefined,
    ]);
    expect(await count("User")).toBe(2);
    expect(await count("Post")).toBe(1);
    expect(await count("Comment")).toBe(0);
  });

  it("only unlinks partners behind SET_NULL ends", async () => {
    await fixture.executor.delete("Profile", { id: await profileId() });

    expect(deletedTypes(fixture.events)).toEqual(["DELETED Profile"]);
    expect(await findUnique(fixture.ctx, "User", { id: seeded.carol })).toMatchObject({
      name: "Carol",
    });
    expect(await selectMany(fixture.ctx, "User", { profile: null })).toHaveLength(3);
  });

  it("leaves list partners of a deleted node in place", async () => {
    await fixture.executor.create("Tag", {
      label: "intro",
      posts: { connect: [{ id: await postId("Hello world") }] },
    });
    fixture.events.splice(0);

    await fixture.executor.delete("Tag", { label: "intro" });

    expect(deletedTypes(fixture.events)).toEqual(["DELETED Tag"]);
    expect(await count("Post")).toBe(3);
    expect(
      await selectMany(fixture.ctx, "Post", { tags_some: { label: "intro" } }),
    ).toEqual([]);
  });

  it("keeps the partner behind a SET_NULL end in a batch delete", async () => {
    const result = await fixture.executor.deleteMany("Post", {
      author: { id: seeded.alice },
    });

    expect(result).toEqual({ count: 2 });
    expect(await count("Post")).toBe(1);
    expect(await count("User")).toBe(3);
  });

  async function postId(title: string): Promise<string> {
    const [post] = await selectMany(fixture.ctx, "Post", { title });
    if (post === undefined) throw new Error(`No post titled ${title}`);
    return post.id;
  }

  async function profileId(): Promise<string> {
    const [profile] = await selectMany(fixture.ctx, "Profile", {
      user: { id: seeded.carol },
    });
    if (profile === undefined) throw new Error("Carol has no profile");
    return profile.id;
  }
});

describe("Cascade cycles", () => {
  const Item = defineType("Item", {
    fields: {
      label: scalar("String", { required: true }),
      next: relation("Item", { name: "Chain", onDelete: "CASCADE" }),
      previous: relation("Item", { name: "Chain", onDelete: "CASCADE" }),
    },
  });

  it("deletes every node of a ring exactly once", async () => {
    const schema = bindSchema({ id: "ring@test", types: [Item] });
    const backend = createTestBackend();
    const feed = createChangeFeed();
    const events: ChangeEvent[] = [];
    feed.subscribe("Item", (event) => {
      events.push(event);
    });
    const executor = createMutationExecutor({ schema, backend, feed });

    const a = await executor.create("Item", { label: "a" });
    const b = await executor.create("Item", {
      label: "b",
      previous: { connect: { id: a.id } },
    });
    await executor.create("Item", {
      label: "c",
      previous: { connect: { id: b.id } },
      next: { connect: { id: a.id } },
    });
    events.splice(0);

    const deleted = await executor.delete("Item", { id: a.id });

    expect(deleted.label).toBe("a");
    expect(events.map((event) => event.previousValues?.label)).toEqual([
      "a",
      "b",
      "c",
    ]);
    expect(await backend.countNodes(schema.id, "Item")).toBe(0);
  });

  it("applies each direction of a self-relation on its own", async () => {
    const Step = defineType("Step", {
      fields: {
        label: scalar("String", { required: true }),
        next: relation("Step", { name: "Chain", onDelete: "CASCADE" }),
        previous: relation("Step", { name: "Chain", onDelete: "SET_NULL" }),
      },
    });
    const schema = bindSchema({ id: "chain@test", types: [Step] });
    const backend = createTestBackend();
    const feed = createChangeFeed();
    const events: ChangeEvent[] = [];
    feed.subscribe("Step", (event) => {
      events.push(event);
    });
    const executor = createMutationExecutor({ schema, backend, feed });

    const a = await executor.create("Step", { label: "a" });
    const b = await executor.create("Step", {
      label: "b",
      previous: { connect: { id: a.id } },
    });
    await executor.create("Step", {
      label: "c",
      previous: { connect: { id: b.id } },
    });
    events.splice(0);

    await executor.delete("Step", { id: b.id });

    expect(events.map((event) => event.previousValues?.label)).toEqual(["b", "c"]);
    const ctx = { schema, backend };
    const remaining = await selectMany(ctx, "Step", {});
    expect(remaining.map((node) => node.label)).toEqual(["a"]);
    const unlinked = await selectMany(ctx, "Step", { next: null });
    expect(unlinked.map((node) => node.id)).toEqual([a.id]);
  });
});
