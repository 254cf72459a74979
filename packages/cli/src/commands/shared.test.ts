import { describe, it, expect } from "vitest";
import { parseIndex } from "./shared.js";

describe("parseIndex", () => {
  it("accepts non-negative integers", () => {
    expect(parseIndex("0")).toBe(0);
    expect(parseIndex(" 12 ")).toBe(12);
  });

  it("rejects everything else", () => {
    expect(parseIndex("-1")).toBeNull();
    expect(parseIndex("1.5")).toBeNull();
    expect(parseIndex("")).toBeNull();
    expect(parseIndex("two")).toBeNull();
  });
});
