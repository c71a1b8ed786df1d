import type { GuidanceHost, ScanPlot, SelfKinematics, SensorAim } from "../src/types.ts";
import type { Vec2 } from "../src/math/vec2.ts";

export function plot(x: number, y: number, vx = 0, vy = 0, tick = 0): ScanPlot {
  return { position: { x, y }, velocity: { x: vx, y: vy }, snr: 20, rssi: -40, tick };
}

export interface RecordingHost extends GuidanceHost {
  plots: Array<ScanPlot | null>;
  self: SelfKinematics;
  aims: SensorAim[];
  linear: Vec2[];
  torques: number[];
  turnRates: number[];
  weapons: number[];
  selfDestructs: number;
}

/** Host stand-in that replays queued plots and records every command. */
export function createRecordingHost(self: Partial<SelfKinematics> = {}): RecordingHost {
  const host: RecordingHost = {
    plots: [],
    self: {
      position: { x: 0, y: 0 },
      velocity: { x: 0, y: 0 },
      heading: 0,
      angularVelocity: 0,
      ...self,
    },
    aims: [],
    linear: [],
    torques: [],
    turnRates: [],
    weapons: [],
    selfDestructs: 0,
    sense: () => host.plots.shift() ?? null,
    selfKinematics: () => host.self,
    setSensorAim: (aim) => {
      host.aims.push(aim);
    },
    actuateLinear: (accel) => {
      host.linear.push(accel);
    },
    actuateTorque: (value) => {
      host.torques.push(value);
    },
    actuateTurnRate: (value) => {
      host.turnRates.push(value);
    },
    triggerWeapon: (index) => {
      host.weapons.push(index);
    },
    triggerSelfDestruct: () => {
      host.selfDestructs += 1;
    },
  };
  return host;
}
