import { describe, expect, it, vi } from "vitest";

import { type ChangeEvent, createChangeFeed } from "../src/events/change-feed";

function event(mutation: ChangeEvent["mutation"], type = "User"): ChangeEvent {
  const node = {
    id: "c1",
    createdAt: "2024-01-15T10:30:00.000Z",
    updatedAt: "2024-01-15T10:30:00.000Z",
  };
  return {
    mutation,
    type,
    node: mutation === "DELETED" ? null : node,
    previousValues: mutation === "CREATED" ? null : node,
    updatedFields: mutation === "UPDATED" ? [] : null,
  };
}

describe("Change Feed", () => {
  it("delivers events to subscribers of their type, in order", () => {
    const feed = createChangeFeed();
    const users: string[] = [];
    const posts: string[] = [];
    feed.subscribe("User", (e) => {
      users.push(e.mutation);
    });
    feed.subscribe("Post", (e) => {
      posts.push(e.mutation);
    });

    feed.publish([event("CREATED"), event("DELETED", "Post"), event("UPDATED")]);

    expect(users).toEqual(["CREATED", "UPDATED"]);
    expect(posts).toEqual(["DELETED"]);
  });

  it("filters by mutation type", () => {
    const feed = createChangeFeed();
    const seen: string[] = [];
    feed.subscribe(
      "User",
      (e) => {
        seen.push(e.mutation);
      },
      { mutationIn: ["DELETED", "UPDATED"] },
    );

    feed.publish([event("CREATED"), event("UPDATED"), event("DELETED")]);

    expect(seen).toEqual(["UPDATED", "DELETED"]);
  });

  it("stops delivering after unsubscribe", () => {
    const feed = createChangeFeed();
    const listener = vi.fn();
    const unsubscribe = feed.subscribe("User", listener);

    feed.publish([event("CREATED")]);
    unsubscribe();
    unsubscribe();
    feed.publish([event("CREATED")]);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(feed.listenerCount()).toBe(0);
  });

  it("keeps later subscribers when an earlier one unsubscribes twice", () => {
    const feed = createChangeFeed();
    const unsubscribe = feed.subscribe("User", () => undefined);
    unsubscribe();
    const listener = vi.fn();
    feed.subscribe("User", listener);

    unsubscribe();
    feed.publish([event("CREATED")]);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("counts listeners per type and overall", () => {
    const feed = createChangeFeed();
    feed.subscribe("User", () => undefined);
    feed.subscribe("User", () => undefined);
    feed.subscribe("Post", () => undefined);

    expect(feed.listenerCount("User")).toBe(2);
    expect(feed.listenerCount("Tag")).toBe(0);
    expect(feed.listenerCount()).toBe(3);
  });

  it("isolates failing listeners", async () => {
    const failures: [string, string][] = [];
    const feed = createChangeFeed({
      onListenerError: (error, e) => {
        failures.push([String(error), e.mutation]);
      },
    });
    const healthy = vi.fn();
    feed.subscribe("User", () => {
      throw new Error("sync");
    });
    feed.subscribe("User", async () => {
      throw new Error("async");
    });
    feed.subscribe("User", healthy);

    feed.publish([event("CREATED")]);
    await vi.waitFor(() => {
      expect(failures).toHaveLength(2);
    });

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(failures).toEqual([
      ["Error: sync", "CREATED"],
      ["Error: async", "CREATED"],
    ]);
  });
});
