import type { GuidanceConfig, SweepProfile } from "../config/guidance-config.ts";
import { wrapAngle } from "../math/angle.ts";
import { angleOf, distance, sub, type Vec2 } from "../math/vec2.ts";
import type { SensorAim } from "../types.ts";

/** Rotates the beam by its previous width and applies the profile's cone. */
export function advancingSweep(previous: SensorAim, profile: SweepProfile): SensorAim {
  return {
    heading: wrapAngle(previous.heading + previous.width),
    width: profile.width,
    minRange: profile.minRange,
    maxRange: profile.maxRange,
  };
}

/**
 * Focuses the beam on a known target: width shrinks with log2 of the range
 * and the range window brackets the target from −30% to +10%.
 */
export function lockSweep(own: Vec2, target: Vec2, config: Pick<GuidanceConfig, "lockMinWidth" | "lockMaxWidth">): SensorAim {
  const d = distance(own, target);
  const rawWidth = d > 2 ? Math.PI / Math.log2(d) : config.lockMaxWidth;
  return {
    heading: angleOf(sub(target, own)),
    width: Math.max(config.lockMinWidth, Math.min(config.lockMaxWidth, rawWidth)),
    minRange: Math.max(0, d - d * 0.3),
    maxRange: d + d * 0.1,
  };
}
