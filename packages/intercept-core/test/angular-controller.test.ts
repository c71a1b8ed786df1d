import { describe, expect, it } from "vitest";
import { convergenceAcceleration, planTurn, turnRateTo } from "../src/control/angular-controller.ts";
import { DEFAULT_GUIDANCE_CONFIG } from "../src/config/guidance-config.ts";
import { angleDiff, wrapAngle } from "../src/math/angle.ts";

const far = DEFAULT_GUIDANCE_CONFIG.farTurn;

describe("convergenceAcceleration", () => {
  it("matches k·e − 2·√k·ω", () => {
    expect(convergenceAcceleration(50, 0.2, 0)).toBeCloseTo(10, 12);
    expect(convergenceAcceleration(4, 0, 1)).toBe(-4);
    expect(convergenceAcceleration(4, 0.5, 1)).toBe(-2);
  });

  it("commands nothing at zero error and zero rate", () => {
    for (const k of [0.5, 4, 50, 1000, 20_000]) {
      expect(convergenceAcceleration(k, 0, 0)).toBe(0);
    }
  });
});

describe("angle wrapping", () => {
  it("takes the short way across ±π", () => {
    expect(angleDiff(3, -3)).toBeCloseTo(2 * Math.PI - 6, 12);
    expect(angleDiff(-3, 3)).toBeCloseTo(6 - 2 * Math.PI, 12);
    expect(wrapAngle(0.05)).toBe(0.05);
  });
});

describe("planTurn", () => {
  it("turns coarsely by torque when far off heading", () => {
    const cmd = planTurn(0, 0.5, 0, far);
    expect(cmd.phase).toBe("coarse-turn");
    expect(cmd.channel).toBe("torque");
    expect(cmd.value).toBeCloseTo(25, 12);
    expect(cmd.fireEligible).toBe(false);
  });

  it("holds with the fine gain inside the coarse tolerance", () => {
    const cmd = planTurn(0, 0.05, 0, far);
    expect(cmd.phase).toBe("fine-hold");
    expect(cmd.channel).toBe("torque");
    expect(cmd.value).toBeCloseTo(50, 9);
    expect(cmd.fireEligible).toBe(false);
  });

  it("commands a rate and allows the trigger once converged", () => {
    const cmd = planTurn(1, 1.005, 0.4, far);
    expect(cmd.phase).toBe("fire-eligible");
    expect(cmd.channel).toBe("turn-rate");
    expect(cmd.value).toBeCloseTo(30 * 0.005, 9);
    expect(cmd.fireEligible).toBe(true);
  });

  it("keeps the trigger closed beyond the range gate", () => {
    const cmd = planTurn(0, 0, 0, far, { distance: 1500, maxRange: 1000 });
    expect(cmd.phase).toBe("fire-eligible");
    expect(cmd.fireEligible).toBe(false);
    expect(planTurn(0, 0, 0, far, { distance: 1000, maxRange: 1000 }).fireEligible).toBe(true);
  });

  it("derives the phase from the error alone", () => {
    const first = planTurn(0, 0.5, 2, far);
    const second = planTurn(0, 0.5, 2, far);
    expect(second).toEqual(first);
  });
});

describe("turnRateTo", () => {
  it("is proportional to the wrapped error", () => {
    expect(turnRateTo(0, Math.PI / 2, 10)).toBeCloseTo(5 * Math.PI, 12);
  });
});
