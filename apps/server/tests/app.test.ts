import { fileURLToPath } from "node:url";

import { createServiceToken, type DataService, RequestError } from "nodeplane";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createApp } from "../src/app";
import { createServerService } from "../src/bootstrap";
import { loadConfig } from "../src/config";
import { createLoggingHooks } from "../src/logging";

const DATAMODEL = fileURLToPath(new URL("../datamodel.json", import.meta.url));

async function bearer(): Promise<string> {
  const token = await createServiceToken({ secret: "test-secret", service: "blog@test" });
  return `Bearer ${token}`;
}

function jsonPost(body: string, authorization?: string): RequestInit {
  return {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      ...(authorization !== undefined && { Authorization: authorization }),
    },
    body,
  };
}

describe("HTTP endpoint", () => {
  let service: DataService;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    service = await createServerService(
      loadConfig({
        NODEPLANE_SECRET: "test-secret",
        NODEPLANE_DATAMODEL: DATAMODEL,
        NODEPLANE_SERVICE: "blog@test",
      }),
    );
    app = createApp({ service, log: () => undefined });
  });

  afterEach(async () => {
    await service.close();
  });

  it("reports health without a token", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", auth: "secret" });
  });

  it("runs an operation body", async () => {
    const res = await app.request(
      "/",
      jsonPost(
        JSON.stringify({
          operation: "createUser",
          args: { data: { email: "sarah@example.com", name: "Sarah" } },
          select: { email: true, role: true },
        }),
        await bearer(),
      ),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { createUser: { email: "sarah@example.com", role: "MEMBER" } },
    });
  });

  it("runs a GraphQL document", async () => {
    const authorization = await bearer();
    await app.request(
      "/",
      jsonPost(
        JSON.stringify({
          query: `mutation ($data: UserCreateInput!) { createUser(data: $data) { id } }`,
          variables: { data: { email: "sarah@example.com", name: "Sarah" } },
        }),
        authorization,
      ),
    );

    const res = await app.request(
      "/",
      jsonPost(JSON.stringify({ query: "{ people: users { name } }" }), authorization),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { people: [{ name: "Sarah" }] } });
  });

  it("answers 401 without a valid token", async () => {
    const res = await app.request(
      "/",
      jsonPost(JSON.stringify({ query: "{ users { id } }" }), "Bearer not-a-jwt"),
    );

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({
      errors: [{ code: "AUTH_ERROR", details: { reason: "INVALID_TOKEN" } }],
    });
  });

  it("reports operation failures with status 200", async () => {
    const res = await app.request(
      "/",
      jsonPost(JSON.stringify({ operation: "createPerson" }), await bearer()),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      errors: [{ code: "UNKNOWN_OPERATION", category: "user" }],
    });
  });

  it.each([
    ["{", "INVALID_DOCUMENT"],
    [JSON.stringify({ query: 42 }), "INVALID_DOCUMENT"],
    [JSON.stringify({ operation: 42 }), "INVALID_ARGUMENTS"],
    [JSON.stringify(null), "INVALID_ARGUMENTS"],
  ])("answers 400 for the body %s", async (body, code) => {
    const res = await app.request("/", jsonPost(body, await bearer()));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ errors: [{ code }] });
  });

  describe("subscriptions", () => {
    it("requires a token", async () => {
      const res = await app.request("/subscriptions/User");

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        errors: [{ code: "AUTH_ERROR", details: { reason: "MISSING_TOKEN" } }],
      });
    });

    it.each([
      ["/subscriptions/Person", "INVALID_ARGUMENTS"],
      ["/subscriptions/User?mutationIn=CREATED,MOVED", "INVALID_ARGUMENTS"],
    ])("answers 400 for %s", async (path, code) => {
      const res = await app.request(path, { headers: { Authorization: await bearer() } });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ errors: [{ code }] });
    });

    it("closes the stream of a subscriber that falls too far behind", async () => {
      const authorization = await bearer();
      const bounded = createApp({ service, log: () => undefined, maxPendingEvents: 2 });
      const res = await bounded.request("/subscriptions/Post", {
        headers: { Authorization: authorization },
      });
      const reader = res.body?.getReader();
      if (reader === undefined) throw new Error("Expected a response body");

      await service.execute(
        {
          operation: "createUser",
          args: {
            data: {
              email: "sarah@example.com",
              name: "Sarah",
              posts: { create: [{ title: "One" }, { title: "Two" }, { title: "Three" }] },
            },
          },
        },
        { authorization },
      );

      const decoder = new TextDecoder();
      let text = "";
      for (;;) {
        const { value, done } = await reader.read();
        if (done) break;
        text += decoder.decode(value, { stream: true });
      }

      const lines = text.split("\n");
      expect(lines).toContain("event: error");
      expect(lines).not.toContain("event: CREATED");
      const data = lines.find((line) => line.startsWith("data: "));
      expect(JSON.parse(data?.slice("data: ".length) ?? "null")).toMatchObject({
        errors: [{ code: "SUBSCRIPTION_OVERFLOW", details: { limit: 2 } }],
      });
    });

    it("streams change events for the type", async () => {
      const authorization = await bearer();
      const res = await app.request("/subscriptions/User?mutationIn=CREATED", {
        headers: { Authorization: authorization },
      });
      expect(res.status).toBe(200);
      expect(res.headers.get("Content-Type")).toBe("text/event-stream");

      const reader = res.body?.getReader();
      if (reader === undefined) throw new Error("Expected a response body");

      await service.execute(
        {
          operation: "createUser",
          args: { data: { email: "sarah@example.com", name: "Sarah" } },
        },
        { authorization },
      );

      const decoder = new TextDecoder();
      let text = "";
      while (!text.includes("\n\n")) {
        const { value, done } = await reader.read();
        if (done) break;
        text += decoder.decode(value, { stream: true });
      }
      await reader.cancel();

      const lines = text.split("\n");
      expect(lines).toContain("event: CREATED");
      expect(lines).toContain("id: 1");
      const data = lines.find((line) => line.startsWith("data: "));
      expect(JSON.parse(data?.slice("data: ".length) ?? "null")).toMatchObject({
        mutation: "CREATED",
        type: "User",
        node: { email: "sarah@example.com", name: "Sarah", role: "MEMBER" },
        previousValues: null,
      });
    });
  });
});

describe("createServerService", () => {
  it("rejects a missing data model file", async () => {
    const config = loadConfig({
      NODEPLANE_SECRET: "test-secret",
      NODEPLANE_DATAMODEL: "./does-not-exist.json",
    });

    await expect(createServerService(config)).rejects.toMatchObject({
      code: "CONFIGURATION_ERROR",
      message: 'Cannot read data model "./does-not-exist.json"',
    });
  });
});

describe("createLoggingHooks", () => {
  const ctx = {
    operationId: "op_1",
    serviceId: "blog@test",
    startedAt: new Date("2024-01-15T10:30:00.000Z"),
  };

  it("logs finished operations", () => {
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const hooks = createLoggingHooks(log);

    hooks.onOperationEnd?.(
      { ...ctx, operation: "users", action: "findMany", type: "User" },
      { durationMs: 12 },
    );

    expect(log.info).toHaveBeenCalledWith("[op_1] users 12.0ms");
  });

  it("logs client failures as warnings and the rest as errors", () => {
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const hooks = createLoggingHooks(log);

    hooks.onError?.(ctx, new RequestError("Unknown operation \"x\"", "UNKNOWN_OPERATION"));
    hooks.onError?.(ctx, new TypeError("boom"));

    expect(log.warn).toHaveBeenCalledWith('[op_1] RequestError: Unknown operation "x"');
    expect(log.error).toHaveBeenCalledWith(expect.stringMatching(/^\[op_1\] TypeError: boom/));
  });
});
