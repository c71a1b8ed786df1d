import type { Vec2 } from "./math/vec2.ts";

export type TrackClass = "tentative" | "friend" | "foe" | "munition";

export type ContactClass = "fighter" | "missile" | "drone" | "unknown";

export type ShipKind = "fighter" | "missile";

/** One instantaneous radar return for an unidentified contact. */
export interface ScanPlot {
  position: Vec2;
  velocity: Vec2;
  snr: number;
  rssi: number;
  tick: number;
  reportedClass?: ContactClass;
  friendly?: boolean;
}

export interface SelfKinematics {
  position: Vec2;
  velocity: Vec2;
  heading: number;
  angularVelocity: number;
}

export interface SensorAim {
  heading: number;
  width: number;
  minRange: number;
  maxRange: number;
}

/**
 * Per-tick contract with the host simulation. At most one rate-style command
 * per axis is issued each tick.
 */
export interface GuidanceHost {
  sense: () => ScanPlot | null;
  selfKinematics: () => SelfKinematics;
  setSensorAim: (aim: SensorAim) => void;
  actuateLinear: (accel: Vec2) => void;
  actuateTorque: (angularAccel: number) => void;
  actuateTurnRate: (angularVelocity: number) => void;
  triggerWeapon: (index: number) => void;
  triggerSelfDestruct: () => void;
}
