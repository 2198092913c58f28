import { describe, expect, it } from "vitest";

import { generateId, isGeneratedId } from "../src/utils/id";

describe("generateId", () => {
  it("produces 25 lowercase alphanumeric characters after a c prefix", () => {
    const id = generateId();
    expect(id).toMatch(/^c[0-9a-z]{24}$/);
    expect(isGeneratedId(id)).toBe(true);
  });

  it("sorts ids in generation order", () => {
    const ids = Array.from({ length: 500 }, () => generateId());
    expect([...ids].sort()).toEqual(ids);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("recognizes only the generated shape", () => {
    expect(isGeneratedId("cjk1e3t7i1ark0b299pvrge5m")).toBe(true);
    expect(isGeneratedId("Cjk1e3t7i1ark0b299pvrge5m")).toBe(false);
    expect(isGeneratedId("c123")).toBe(false);
    expect(isGeneratedId("user-1")).toBe(false);
  });
});
