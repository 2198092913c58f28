import { ConfigurationError } from "nodeplane";
import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/config";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ NODEPLANE_SECRET: "test-secret" })).toEqual({
      port: 4466,
      databasePath: ":memory:",
      datamodelPath: "./datamodel.json",
      serviceId: "default@default",
      auth: { mode: "secret", secrets: ["test-secret"] },
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      PORT: "8080",
      NODEPLANE_DATABASE: "./blog.db",
      NODEPLANE_DATAMODEL: "./blog.json",
      NODEPLANE_SERVICE: "blog@dev",
      NODEPLANE_SECRET: " old-secret , test-secret ,",
    });

    expect(config).toEqual({
      port: 8080,
      databasePath: "./blog.db",
      datamodelPath: "./blog.json",
      serviceId: "blog@dev",
      auth: { mode: "secret", secrets: ["old-secret", "test-secret"] },
    });
  });

  it("disables auth only when asked", () => {
    expect(loadConfig({ NODEPLANE_DISABLE_AUTH: "true" }).auth).toEqual({
      mode: "disabled",
    });
  });

  it.each([
    [{}, "No authentication configured"],
    [{ NODEPLANE_DISABLE_AUTH: "false" }, "No authentication configured"],
    [{ NODEPLANE_SECRET: " , " }, "No authentication configured"],
    [
      { NODEPLANE_SECRET: "test-secret", NODEPLANE_DISABLE_AUTH: "true" },
      "NODEPLANE_SECRET and NODEPLANE_DISABLE_AUTH are mutually exclusive",
    ],
  ])("rejects ambiguous auth %j", (env, message) => {
    const error = thrownBy(() => loadConfig(env));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message });
  });

  it.each([
    [{ PORT: "http" }, /^Invalid environment: PORT: /],
    [{ PORT: "70000" }, /^Invalid environment: PORT: /],
    [{ NODEPLANE_SERVICE: "blog" }, /NODEPLANE_SERVICE: Expected <name>@<stage>/],
    [{ NODEPLANE_DISABLE_AUTH: "yes" }, /^Invalid environment: NODEPLANE_DISABLE_AUTH: /],
  ])("rejects malformed variables %j", (env, message) => {
    const error = thrownBy(() => loadConfig({ NODEPLANE_SECRET: "test-secret", ...env }));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message: expect.stringMatching(message) });
  });
});
