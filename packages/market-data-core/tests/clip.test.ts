import { describe, it, expect } from "vitest";
import { clipBars } from "../src/clip.js";
import { bar, timestamps } from "./fixtures.js";

describe("clipBars", () => {
  const bars = [0, 60_000, 120_000, 180_000, 240_000, 300_000].map((t) => bar(t));

  it("should keep both bounds", () => {
    expect(timestamps(clipBars(bars, 60_000, 240_000))).toEqual([60_000, 120_000, 180_000, 240_000]);
  });

  it("should treat missing bounds as open", () => {
    expect(timestamps(clipBars(bars, 200_000))).toEqual([240_000, 300_000]);
    expect(timestamps(clipBars(bars, undefined, 100_000))).toEqual([0, 60_000]);
    expect(clipBars(bars)).toHaveLength(6);
  });

  it("should keep the single bar when from equals to", () => {
    expect(timestamps(clipBars(bars, 120_000, 120_000))).toEqual([120_000]);
  });

  it("should return nothing for inverted or disjoint ranges", () => {
    expect(clipBars(bars, 240_000, 60_000)).toEqual([]);
    expect(clipBars(bars, 301_000, 400_000)).toEqual([]);
    expect(clipBars(bars, 61_000, 119_000)).toEqual([]);
    expect(clipBars([], 0, 1)).toEqual([]);
  });

  it("should handle negative timestamps", () => {
    const early = [-120_000, -60_000, 0].map((t) => bar(t));
    expect(timestamps(clipBars(early, -60_000, 0))).toEqual([-60_000, 0]);
  });
});
