import { describe, it, expect } from "vitest";
import { hasOpenInterest, promoteOpenInterest } from "../src/columns.js";
import { bar } from "./fixtures.js";

describe("promoteOpenInterest", () => {
  it("should fill missing values with null when any bar has open interest", () => {
    const result = promoteOpenInterest([bar(1, 100, { openInterest: 5000 }), bar(2), bar(3, 100, { openInterest: null })]);

    expect(result.hasOpenInterest).toBe(true);
    expect(result.bars.map((b) => b.openInterest)).toEqual([5000, null, null]);
  });

  it("should drop the key when no bar has a value", () => {
    const result = promoteOpenInterest([bar(1, 100, { openInterest: null }), bar(2)]);

    expect(result.hasOpenInterest).toBe(false);
    for (const b of result.bars) {
      expect("openInterest" in b).toBe(false);
    }
  });

  it("should not modify the input bars", () => {
    const input = [bar(1), bar(2, 100, { openInterest: 7 })];
    promoteOpenInterest(input);
    expect("openInterest" in (input[0] ?? {})).toBe(false);
  });
});

describe("hasOpenInterest", () => {
  it("should ignore null values", () => {
    expect(hasOpenInterest([bar(1, 100, { openInterest: null })])).toBe(false);
    expect(hasOpenInterest([bar(1, 100, { openInterest: 0 })])).toBe(true);
    expect(hasOpenInterest([])).toBe(false);
  });
});
