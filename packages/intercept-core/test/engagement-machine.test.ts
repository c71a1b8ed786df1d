import { describe, expect, it } from "vitest";
import { resolveGuidanceConfig, type GuidanceConfigOverrides } from "../src/config/guidance-config.ts";
import { EngagementMachine, type EngagementUpdate } from "../src/engagement/engagement-machine.ts";
import { lockSweep } from "../src/engagement/radar-sweep.ts";
import { Tracker } from "../src/tracking/tracker.ts";
import type { ScanPlot } from "../src/types.ts";
import { plot } from "./fixtures.ts";

const origin = { x: 0, y: 0 };

function rig(overrides: GuidanceConfigOverrides = {}): {
  tracker: Tracker;
  machine: EngagementMachine;
  step: (p: ScanPlot | null) => EngagementUpdate;
} {
  const config = resolveGuidanceConfig(overrides);
  const tracker = new Tracker(config);
  const machine = new EngagementMachine(config);
  return {
    tracker,
    machine,
    step: (p) => machine.update(tracker, tracker.ingest(p), origin),
  };
}

describe("EngagementMachine designation", () => {
  it("holds a designation for the sticky window before switching to a nearer track", () => {
    const { machine, step } = rig({ stickyTargetTicks: 3 });
    const far = plot(1000, 0);
    const near = plot(500, 0);

    const designated: Array<number | null> = [];
    const sticky: number[] = [];
    for (const p of [far, near, far, near, far]) {
      designated.push(step(p).designatedTrackId);
      sticky.push(machine.stickyTicksRemaining);
    }

    expect(designated).toEqual([0, 0, 0, 0, 1]);
    expect(sticky).toEqual([3, 2, 1, 0, 3]);
  });

  it("reports a changed designation on the switching tick only", () => {
    const { step } = rig({ stickyTargetTicks: 0 });
    expect(step(plot(1000, 0)).designationChanged).toBe(true);
    expect(step(plot(1000, 0)).designationChanged).toBe(false);
    const update = step(plot(500, 0));
    expect(update.designatedTrackId).toBe(1);
    expect(update.designationChanged).toBe(true);
  });

  it("drops a pruned designation and acquires the next track in the same tick", () => {
    const { step } = rig({ stickyTargetTicks: 100 });
    step(plot(1000, 0));

    const updates: EngagementUpdate[] = [];
    for (let i = 0; i < 30; i += 1) {
      updates.push(step(plot(500, 0)));
    }

    const beforePrune = updates.slice(0, 29);
    expect(beforePrune.every((u) => u.designatedTrackId === 0 && !u.staleTargetCleared)).toBe(true);
    const pruneTick = updates[29];
    expect(pruneTick?.staleTargetCleared).toBe(true);
    expect(pruneTick?.designatedTrackId).toBe(1);
    expect(pruneTick?.mode).toBe("engaged");
  });
});

describe("EngagementMachine modes", () => {
  it("goes from engaged to searching to out of radar range as contact ages", () => {
    const { step } = rig();
    const modes = [step(plot(1000, 0)).mode];
    for (let i = 0; i < 31; i += 1) {
      modes.push(step(null).mode);
    }

    expect(modes.slice(0, 30).every((m) => m === "engaged")).toBe(true);
    expect(modes[30]).toBe("searching");
    expect(modes[31]).toBe("out-of-radar-range");
  });

  it("stays in no-target until the radar has been silent past the loss limit", () => {
    const { step } = rig();
    const modes: string[] = [];
    for (let i = 0; i < 31; i += 1) {
      modes.push(step(null).mode);
    }
    expect(modes.slice(0, 30).every((m) => m === "no-target")).toBe(true);
    expect(modes[30]).toBe("out-of-radar-range");
  });

  it("marks a designated track beyond the engagement range", () => {
    const { step } = rig({ maxEngagementRange: 800 });
    expect(step(plot(1000, 0)).mode).toBe("out-of-target-range");
    expect(step(plot(700, 0)).mode).toBe("out-of-target-range");
  });

  it("returns to no-target after a reset", () => {
    const { machine, step } = rig();
    step(plot(1000, 0));
    machine.reset();
    expect(machine.mode).toBe("no-target");
    expect(machine.designatedTrackId).toBeNull();
  });
});

describe("sensor sweeps", () => {
  it("advances the search beam by its width every tick", () => {
    const { tracker, machine } = rig();
    const first = machine.sweepFor(tracker, origin);
    const second = machine.sweepFor(tracker, origin);
    expect(first).toEqual({ heading: 0, width: Math.PI / 4, minRange: 25, maxRange: 10_000 });
    expect(second.heading).toBeCloseTo(Math.PI / 4, 12);
  });

  it("locks onto the designated track while engaged", () => {
    const { tracker, machine, step } = rig();
    step(plot(0, 1024));
    const sweep = machine.sweepFor(tracker, origin);
    expect(sweep.heading).toBeCloseTo(Math.PI / 2, 12);
    expect(sweep.width).toBeCloseTo(Math.PI / 10, 12);
  });

  it("uses the long-range profile once the radar has lost contact", () => {
    const { tracker, machine, step } = rig();
    for (let i = 0; i < 31; i += 1) {
      step(null);
    }
    expect(machine.sweepFor(tracker, origin).maxRange).toBe(1_000_000);
  });
});

describe("lockSweep", () => {
  const limits = { lockMinWidth: 0.005, lockMaxWidth: Math.PI / 4 };

  it("narrows with log2 of range and brackets the target", () => {
    const sweep = lockSweep(origin, { x: 1024, y: 0 }, limits);
    expect(sweep.heading).toBe(0);
    expect(sweep.width).toBeCloseTo(Math.PI / 10, 12);
    expect(sweep.minRange).toBeCloseTo(716.8, 9);
    expect(sweep.maxRange).toBeCloseTo(1126.4, 9);
  });

  it("clamps the width at both ends", () => {
    expect(lockSweep(origin, { x: 1, y: 0 }, limits).width).toBe(Math.PI / 4);
    expect(lockSweep(origin, { x: 8, y: 0 }, limits).width).toBe(Math.PI / 4);
    expect(lockSweep(origin, { x: 1e300, y: 0 }, limits).width).toBe(0.005);
  });
});
