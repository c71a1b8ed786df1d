import { describe, expect, it } from "vitest";
import { gaussian, mulberry32, randomRange } from "../src/lib/seeded-rng.ts";

describe("mulberry32", () => {
  it("repeats its sequence for a seed", () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect(first.every((x) => x >= 0 && x < 1)).toBe(true);
  });

  it("differs across seeds", () => {
    expect(mulberry32(1)()).not.toBe(mulberry32(2)());
  });

  it("maps into a range and draws finite normals", () => {
    const rng = mulberry32(7);
    for (let i = 0; i < 100; i += 1) {
      const r = randomRange(rng, -5, 5);
      expect(r).toBeGreaterThanOrEqual(-5);
      expect(r).toBeLessThan(5);
      expect(Number.isFinite(gaussian(rng))).toBe(true);
    }
  });
});
