import { fromAngle, length, sub, type Vec2 } from "../math/vec2.ts";
import type { SelfKinematics } from "../types.ts";

export interface TargetState {
  position: Vec2;
  velocity: Vec2;
}

/** Gun muzzle reference point, set back along the heading from the body center. */
export function muzzlePoint(self: SelfKinematics, offset: number): Vec2 {
  return sub(self.position, fromAngle(self.heading, offset));
}

/** Range divided by own speed; infinite while stationary. */
export function secondsToIntercept(origin: Vec2, ownVelocity: Vec2, target: TargetState): number {
  const speed = length(ownVelocity);
  return speed > 0 ? length(sub(origin, target.position)) / speed : Number.POSITIVE_INFINITY;
}

export function secondsToStop(ownVelocity: Vec2, maxForwardAcceleration: number): number {
  return length(ownVelocity) / maxForwardAcceleration;
}
