import type { SensorAim, Vec2 } from "../../../packages/intercept-core/src/index.ts";

export type Team = "blue" | "red";

export type BodyKind = "fighter" | "missile" | "drone";

export interface Body {
  readonly id: number;
  readonly kind: BodyKind;
  readonly team: Team;
  position: Vec2;
  velocity: Vec2;
  heading: number;
  angularVelocity: number;
  health: number;
  readonly radius: number;
  alive: boolean;
  readonly spawnTick: number;
  readonly launchedBy: number | null;
  missilesLeft: number;
  gunCooldown: number;
  missileCooldown: number;
  sensorAim: SensorAim | null;
}

export interface BodyInit {
  kind: BodyKind;
  team: Team;
  position: Vec2;
  velocity?: Vec2;
  heading?: number;
  launchedBy?: number;
}

/** Commands buffered by a pilot during one tick and applied by `step`. */
export interface BodyCommands {
  linear: Vec2 | null;
  torque: number | null;
  turnRate: number | null;
  weapons: Set<number>;
  selfDestruct: boolean;
}

export interface Bullet {
  position: Vec2;
  velocity: Vec2;
  readonly team: Team;
  readonly ownerId: number;
  ttl: number;
}

export interface BulletHit {
  ownerId: number;
  targetId: number;
}

export interface StepEvents {
  tick: number;
  shots: number[];
  launched: number[];
  hits: BulletHit[];
  detonations: number[];
  destroyed: number[];
}

export interface HullProfile {
  health: number;
  radius: number;
  maxAccel: number;
  maxAngularAccel: number;
  maxTurnRate: number;
}

export interface WorldSettings {
  ticksPerSecond: number;
  projectileSpeed: number;
  bulletLifetimeTicks: number;
  bulletDamage: number;
  gunIndex: number;
  missileIndex: number;
  gunCooldownTicks: number;
  missileCooldownTicks: number;
  missileMagazine: number;
  missileLifetimeTicks: number;
  blastRadius: number;
  blastDamage: number;
  /** Standard deviation of radar position error, metres. */
  radarNoise: number;
  /** Standard deviation of radar velocity error, m/s. */
  radarVelocityNoise: number;
  /** Receiver noise floor used to derive plot SNR, dB. */
  radarNoiseFloor: number;
  halfSize: number;
  hulls: Record<BodyKind, HullProfile>;
}

export const DEFAULT_WORLD_SETTINGS: Readonly<WorldSettings> = {
  ticksPerSecond: 60,
  projectileSpeed: 1000,
  bulletLifetimeTicks: 120,
  bulletDamage: 10,
  gunIndex: 0,
  missileIndex: 1,
  gunCooldownTicks: 6,
  missileCooldownTicks: 120,
  missileMagazine: 4,
  missileLifetimeTicks: 900,
  blastRadius: 50,
  blastDamage: 100,
  radarNoise: 5,
  radarVelocityNoise: 2,
  radarNoiseFloor: -200,
  halfSize: 20_000,
  hulls: {
    fighter: { health: 100, radius: 10, maxAccel: 60, maxAngularAccel: 4 * Math.PI, maxTurnRate: 2 * Math.PI },
    missile: { health: 5, radius: 2, maxAccel: 400, maxAngularAccel: 8 * Math.PI, maxTurnRate: 4 * Math.PI },
    drone: { health: 40, radius: 8, maxAccel: 30, maxAngularAccel: Math.PI, maxTurnRate: Math.PI },
  },
};
