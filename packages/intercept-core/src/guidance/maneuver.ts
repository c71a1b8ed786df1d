import type { GuidanceConfig } from "../config/guidance-config.ts";
import { add, distance, length, normalize, scale, sub, type Vec2 } from "../math/vec2.ts";
import type { SelfKinematics } from "../types.ts";
import { secondsToIntercept, secondsToStop, type TargetState } from "./geometry.ts";

export type ManeuverBand = "hold" | "match" | "close-in" | "brake";

export interface ManeuverDecision {
  accel: Vec2;
  band: ManeuverBand;
}

export type ManeuverSettings = Pick<GuidanceConfig, "holdRange" | "closeRange" | "maxForwardAcceleration">;

/**
 * Range-band translation toward a target. Brakes whenever the body could not
 * stop before reaching the target at its current speed.
 */
export function computeManeuver(self: SelfKinematics, origin: Vec2, target: TargetState, settings: ManeuverSettings): ManeuverDecision {
  const los = sub(target.position, origin);
  const range = length(los);
  const unit = normalize(los);

  if (secondsToStop(self.velocity, settings.maxForwardAcceleration) >= secondsToIntercept(origin, self.velocity, target)) {
    return { accel: scale(self.velocity, -1), band: "brake" };
  }
  if (range < settings.holdRange) {
    // Compare against where the target will be in one second.
    const opening = distance(origin, add(target.position, target.velocity)) > range;
    return { accel: scale(unit, opening ? 10 : -10), band: "hold" };
  }
  if (range < settings.closeRange) {
    return { accel: scale(target.velocity, 10), band: "match" };
  }
  return { accel: scale(unit, 100), band: "close-in" };
}
