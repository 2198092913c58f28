/**
 * Shared test utilities for Nodeplane tests.
 *
 * Uses createLocalSqliteBackend from the public sqlite module.
 */
import { afterEach } from "vitest";

import { createServiceToken } from "../src/auth/token";
import { defineType } from "../src/core/define-type";
import { enumeration, relation, scalar } from "../src/core/field";
import { createChangeFeed, type ChangeEvent } from "../src/events/change-feed";
import { createLocalSqliteBackend } from "../src/backend/sqlite";
import type { StoreBackend } from "../src/backend/types";
import {
  createMutationExecutor,
  type MutationExecutor,
} from "../src/mutation/executor";
import { bindSchema } from "../src/schema/binder";
import type { BoundSchema } from "../src/schema/types";
import { createService } from "../src/service/service";
import type { DataService, ServiceOptions } from "../src/service/types";
import type { StoreContext } from "../src/store/types";

const backendsToClose: StoreBackend[] = [];

async function closeCreatedTestBackends(): Promise<void> {
  const current = backendsToClose.splice(0);
  await Promise.all(current.map((backend) => backend.close()));
}

afterEach(closeCreatedTestBackends);

/**
 * Creates a StoreBackend using in-memory SQLite.
 * This is the primary way to create backends for testing.
 */
export function createTestBackend(): StoreBackend {
  const { backend } = createLocalSqliteBackend();
  backendsToClose.push(backend);
  return backend;
}

// ============================================================
// Blog Data Model
// ============================================================

export const User = defineType("User", {
  fields: {
    email: scalar("String", { required: true, unique: true }),
    name: scalar("String", { required: true }),
    role: enumeration(["ADMIN", "MEMBER"], { default: "MEMBER" }),
    age: scalar("Int"),
    posts: relation("Post", { list: true, onDelete: "CASCADE" }),
    profile: relation("Profile"),
  },
});

export const Post = defineType("Post", {
  fields: {
    title: scalar("String", { required: true }),
    published: scalar("Boolean", { default: false }),
    views: scalar("Int", { default: 0 }),
    author: relation("User", { required: true }),
    comments: relation("Comment", { list: true, onDelete: "CASCADE" }),
    tags: relation("Tag", { list: true }),
  },
});

export const Comment = defineType("Comment", {
  fields: {
    text: scalar("String", { required: true }),
    post: relation("Post", { required: true }),
  },
});

export const Profile = defineType("Profile", {
  fields: {
    bio: scalar("String"),
    user: relation("User"),
  },
});

export const Tag = defineType("Tag", {
  fields: {
    label: scalar("String", { required: true, unique: true }),
    posts: relation("Post", { list: true }),
  },
});

export function createBlogSchema(id = "blog@test"): BoundSchema {
  return bindSchema({ id, types: [User, Post, Comment, Profile, Tag] });
}

// ============================================================
// Fixtures
// ============================================================

export type BlogFixture = Readonly<{
  schema: BoundSchema;
  backend: StoreBackend;
  executor: MutationExecutor;
  events: ChangeEvent[];
  /** Store context outside any transaction, for assertions */
  ctx: StoreContext;
}>;

/**
 * A mutation executor over a fresh in-memory store. Every published change
 * event lands in `events`.
 */
export function createBlogFixture(): BlogFixture {
  const schema = createBlogSchema();
  const backend = createTestBackend();
  const feed = createChangeFeed();
  const events: ChangeEvent[] = [];
  for (const type of schema.types.keys()) {
    feed.subscribe(type, (event) => {
      events.push(event);
    });
  }
  const executor = createMutationExecutor({ schema, backend, feed });
  return { schema, backend, executor, events, ctx: { schema, backend } };
}

export const TEST_SECRET = "test-secret";

export function createTestService(
  options: Partial<Omit<ServiceOptions, "backend" | "schema">> = {},
): DataService {
  return createService({
    schema: createBlogSchema(),
    backend: createTestBackend(),
    auth: { mode: "secret", secrets: [TEST_SECRET] },
    ...options,
  });
}

export async function bearer(secret = TEST_SECRET): Promise<string> {
  const token = await createServiceToken({ secret, service: "blog@test" });
  return `Bearer ${token}`;
}

/**
 * Narrows an unknown value to a plain record, failing the test otherwise.
 */
export function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new TypeError(`Expected an object, got ${JSON.stringify(value)}`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function asArray(value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new TypeError(`Expected an array, got ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Returns what a synchronous call throws, failing the test if it returns.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}

export type SeededBlog = Readonly<{
  alice: string;
  bob: string;
  carol: string;
}>;

/**
 * Alice (admin, two posts, one published), Bob (one published post) and
 * Carol (no posts, a profile), created in that order.
 */
export async function seedBlog(executor: MutationExecutor): Promise<SeededBlog> {
  const alice = await executor.create("User", {
    email: "alice@example.com",
    name: "Alice",
    role: "ADMIN",
    age: 30,
    posts: {
      create: [
        { title: "Hello world", published: true, views: 10 },
        { title: "Draft" },
      ],
    },
  });
  const bob = await executor.create("User", {
    email: "bob@example.com",
    name: "Bob",
    age: 25,
    posts: { create: { title: "Bob's post", published: true, views: 3 } },
  });
  const carol = await executor.create("User", {
    email: "carol@test.org",
    name: "Carol",
    profile: { create: { bio: "hi" } },
  });
  return { alice: alice.id, bob: bob.id, carol: carol.id };
}
