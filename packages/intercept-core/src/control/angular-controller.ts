import type { TurnProfile } from "../config/guidance-config.ts";
import { angleDiff } from "../math/angle.ts";

export type TurnPhase = "coarse-turn" | "fine-hold" | "fire-eligible";

export interface TurnCommand {
  phase: TurnPhase;
  /** Which actuator channel the value is meant for. */
  channel: "torque" | "turn-rate";
  value: number;
  headingError: number;
  fireEligible: boolean;
}

export interface RangeGate {
  distance: number;
  maxRange: number;
}

/**
 * Critically damped angular command for a unit-inertia body:
 * accel = k·e − 2·√k·ω.
 */
export function convergenceAcceleration(gain: number, headingError: number, angularVelocity: number): number {
  return gain * headingError - 2 * Math.sqrt(gain) * angularVelocity;
}

export function planTurn(
  heading: number,
  desiredHeading: number,
  angularVelocity: number,
  profile: TurnProfile,
  range?: RangeGate,
): TurnCommand {
  const headingError = angleDiff(heading, desiredHeading);
  const magnitude = Math.abs(headingError);
  if (magnitude > profile.coarseTolerance) {
    return {
      phase: "coarse-turn",
      channel: "torque",
      value: convergenceAcceleration(profile.coarseGain, headingError, angularVelocity),
      headingError,
      fireEligible: false,
    };
  }
  if (magnitude > profile.fireTolerance) {
    return {
      phase: "fine-hold",
      channel: "torque",
      value: convergenceAcceleration(profile.fineGain, headingError, angularVelocity),
      headingError,
      fireEligible: false,
    };
  }
  // Converged: hold the heading with a rate command instead of an acceleration.
  const inRange = range ? range.distance <= range.maxRange : true;
  return {
    phase: "fire-eligible",
    channel: "turn-rate",
    value: profile.rateGain * headingError,
    headingError,
    fireEligible: inRange,
  };
}

/** Proportional rate command, used where the body can slew directly. */
export function turnRateTo(heading: number, desiredHeading: number, gain: number): number {
  return gain * angleDiff(heading, desiredHeading);
}
