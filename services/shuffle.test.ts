import { describe, expect, it } from "vitest";
import { attemptSeed, seededPermutation } from "./shuffle";

const items = Array.from({ length: 20 }, (_, i) => i + 1);

describe("seededPermutation", () => {
  it("returns the same order for the same seed", () => {
    expect(seededPermutation(items, "attempt:4")).toEqual(
      seededPermutation(items, "attempt:4")
    );
  });

  it("keeps every item exactly once", () => {
    const shuffled = seededPermutation(items, "attempt:9");
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
  });

  it("does not touch the input", () => {
    const input = [1, 2, 3, 4, 5];
    seededPermutation(input, "attempt:1");
    expect(input).toEqual([1, 2, 3, 4, 5]);
  });

  it("varies with the seed", () => {
    const orders = new Set(
      [1, 2, 3, 4, 5].map((id) =>
        seededPermutation(items, attemptSeed(id)).join(",")
      )
    );
    expect(orders.size).toBeGreaterThan(1);
  });

  it("handles empty and single-item lists", () => {
    expect(seededPermutation([], "x")).toEqual([]);
    expect(seededPermutation(["only"], "x")).toEqual(["only"]);
  });

  it("derives the seed from the attempt id", () => {
    expect(attemptSeed(42)).toBe("attempt:42");
  });
});
