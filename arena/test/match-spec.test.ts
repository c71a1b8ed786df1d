import { describe, expect, it } from "vitest";
import { silentLogger } from "../../packages/intercept-core/src/index.ts";
import { MatchSpecError, normalizeMatchSpec } from "../src/match/match-spec.ts";
import { runMatch } from "../src/match/run-match.ts";
import { replayMatch } from "../src/replay/run-replay.ts";

describe("normalizeMatchSpec", () => {
  it("fills fields from defaults, then built-ins", () => {
    expect(normalizeMatchSpec({}, { seed: 9, drones: 4 })).toEqual({
      seed: 9,
      maxSimSeconds: 120,
      drones: 4,
      droneSpeed: 120,
      radarNoise: 5,
      guidance: {},
    });
  });

  it("takes the drone count from explicit placements", () => {
    const spec = normalizeMatchSpec({ seed: 1, drones: 5, placements: [{ x: 1, y: 2 }] });
    expect(spec.drones).toBe(1);
    expect(spec.placements).toEqual([{ x: 1, y: 2, vx: 0, vy: 0 }]);
  });

  it("keeps only known guidance overrides", () => {
    const spec = normalizeMatchSpec({ seed: 1, guidance: { stickyTargetTicks: 4, bogus: 1, launchMissiles: false } });
    expect(spec.guidance).toEqual({ stickyTargetTicks: 4, launchMissiles: false });
  });

  it("rejects bad values", () => {
    expect(() => normalizeMatchSpec({ maxSimSeconds: 0 })).toThrowError(MatchSpecError);
    expect(() => normalizeMatchSpec({ placements: [{ x: 1 }] })).toThrowError("placements[0] needs numeric x and y");
    expect(() => normalizeMatchSpec("match")).toThrowError("match spec must be a JSON object");
    expect(() => normalizeMatchSpec({ guidance: { stalenessTicks: 0 } })).toThrowError(MatchSpecError);
  });
});

describe("replayMatch", () => {
  it("reproduces a stored result", () => {
    const stored = runMatch(normalizeMatchSpec({ seed: 21, drones: 1, maxSimSeconds: 2 }));
    const report = replayMatch(JSON.stringify(stored), silentLogger);
    expect(report.reproduced).toBe(true);
    expect(report.result).toEqual(stored);
  });
});
