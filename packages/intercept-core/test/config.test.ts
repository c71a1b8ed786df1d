import { describe, expect, it } from "vitest";
import { DEFAULT_GUIDANCE_CONFIG, GuidanceConfigError, resolveGuidanceConfig } from "../src/config/guidance-config.ts";

describe("resolveGuidanceConfig", () => {
  it("returns the defaults when nothing is overridden", () => {
    expect(resolveGuidanceConfig()).toEqual(DEFAULT_GUIDANCE_CONFIG);
  });

  it("merges nested profiles field by field", () => {
    const config = resolveGuidanceConfig({ farTurn: { coarseGain: 80 }, stickyTargetTicks: 5 });
    expect(config.farTurn).toEqual({ coarseGain: 80, fineGain: 1000, coarseTolerance: 0.1, fireTolerance: 0.01, rateGain: 30 });
    expect(config.stickyTargetTicks).toBe(5);
    expect(config.closeTurn).toEqual(DEFAULT_GUIDANCE_CONFIG.closeTurn);
  });

  it("rejects a non-positive tick rate", () => {
    expect(() => resolveGuidanceConfig({ ticksPerSecond: 0 })).toThrowError(
      "invalid guidance config: ticksPerSecond must be a positive finite number (got 0)",
    );
  });

  it("names the offending field", () => {
    try {
      resolveGuidanceConfig({ stickyTargetTicks: 1.5 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GuidanceConfigError);
      expect(error instanceof GuidanceConfigError ? error.field : "").toBe("stickyTargetTicks");
    }
  });

  it("bounds the intercept iteration count to 10..20", () => {
    expect(resolveGuidanceConfig({ interceptIterations: 20 }).interceptIterations).toBe(20);
    expect(() => resolveGuidanceConfig({ interceptIterations: 0 })).toThrowError(
      "invalid guidance config: interceptIterations must be an integer in [10, 20] (got 0)",
    );
    expect(() => resolveGuidanceConfig({ interceptIterations: 21 })).toThrowError(GuidanceConfigError);
  });

  it("rejects a lock width floor above the ceiling", () => {
    expect(() => resolveGuidanceConfig({ lockMinWidth: 1 })).toThrowError(GuidanceConfigError);
  });
});
