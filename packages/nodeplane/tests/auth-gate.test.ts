import { sign } from "hono/jwt";
import { describe, expect, it } from "vitest";

import { createAuthGate } from "../src/auth/gate";
import { createServiceToken } from "../src/auth/token";
import { AuthError, ConfigurationError } from "../src/errors";
import { bearer, TEST_SECRET, thrownBy } from "./test-utils";

const HOUR_MS = 60 * 60 * 1000;

describe("Auth Gate", () => {
  const gate = createAuthGate({ mode: "secret", secrets: [TEST_SECRET] });

  async function reasonFor(authorization: string | undefined): Promise<string> {
    const result = await gate.authenticate(authorization);
    if (result.success) throw new Error("Expected the gate to reject");
    expect(result.error).toBeInstanceOf(AuthError);
    return result.error.reason;
  }

  it("admits a token signed with the service secret", async () => {
    const result = await gate.authenticate(await bearer());

    expect(gate.mode).toBe("secret");
    expect(result).toEqual({
      success: true,
      data: { authenticated: true, service: "blog@test", roles: ["admin"] },
    });
  });

  it("accepts the scheme in any case", async () => {
    const token = await createServiceToken({ secret: TEST_SECRET, service: "s" });
    const result = await gate.authenticate(`bearer ${token}`);
    expect(result.success).toBe(true);
  });

  it.each([[undefined], [""], ["   "]])(
    "rejects a missing header (%j)",
    async (authorization) => {
      expect(await reasonFor(authorization)).toBe("MISSING_TOKEN");
    },
  );

  it.each([["Token abc"], ["Bearer"], ["Bearer a b"]])(
    "rejects a malformed header (%j)",
    async (authorization) => {
      expect(await reasonFor(authorization)).toBe("MALFORMED_HEADER");
    },
  );

  it("rejects a token that is not a JWT", async () => {
    expect(await reasonFor("Bearer not-a-jwt")).toBe("INVALID_TOKEN");
  });

  it("rejects a token signed with another secret", async () => {
    expect(await reasonFor(await bearer("other-secret"))).toBe("INVALID_TOKEN");
  });

  it("rejects an expired token", async () => {
    const token = await createServiceToken({
      secret: TEST_SECRET,
      service: "blog@test",
      expiresInSeconds: 60,
      now: () => Date.now() - 2 * HOUR_MS,
    });

    const result = await gate.authenticate(`Bearer ${token}`);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({
        code: "AUTH_ERROR",
        reason: "EXPIRED_TOKEN",
        suggestion: "Generate a new service token.",
      });
    }
  });

  it("rejects a token whose claims have the wrong shape", async () => {
    const token = await sign(
      { data: { roles: "admin" }, exp: Math.floor(Date.now() / 1000) + 60 },
      TEST_SECRET,
      "HS256",
    );
    expect(await reasonFor(`Bearer ${token}`)).toBe("INVALID_TOKEN");
  });

  it("rejects a token that never expires", async () => {
    const token = await sign({ iat: Math.floor(Date.now() / 1000) }, TEST_SECRET, "HS256");
    expect(await reasonFor(`Bearer ${token}`)).toBe("INVALID_TOKEN");
  });

  it("accepts any of several secrets during rotation", async () => {
    const rotating = createAuthGate({
      mode: "secret",
      secrets: ["old-secret", TEST_SECRET],
    });

    expect((await rotating.authenticate(await bearer("old-secret"))).success).toBe(true);
    expect((await rotating.authenticate(await bearer())).success).toBe(true);
    expect((await rotating.authenticate(await bearer("retired-secret"))).success).toBe(
      false,
    );
  });

  it("admits every request when disabled", async () => {
    const open = createAuthGate({ mode: "disabled" });

    expect(open.mode).toBe("disabled");
    expect(await open.authenticate(undefined)).toEqual({
      success: true,
      data: { authenticated: false, service: undefined, roles: [] },
    });
  });

  it("requires an explicit configuration", () => {
    expect(thrownBy(() => createAuthGate(undefined))).toBeInstanceOf(ConfigurationError);
  });

  it("requires a non-empty secret in secret mode", () => {
    const error = thrownBy(() => createAuthGate({ mode: "secret", secrets: ["", ""] }));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: "CONFIGURATION_ERROR" });
  });
});
