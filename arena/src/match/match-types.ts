import type { EngagementMode, GuidanceConfigOverrides } from "../../../packages/intercept-core/src/index.ts";

export type DronePlacement = {
  x: number;
  y: number;
  vx: number;
  vy: number;
};

export type MatchSpec = {
  seed: number;
  maxSimSeconds: number;
  drones: number;
  droneSpeed: number;
  /** Radar position error, metres (1σ). */
  radarNoise: number;
  guidance: GuidanceConfigOverrides;
  /** Fixed drone starts; replaces the seeded ring when present. */
  placements?: DronePlacement[];
};

export type MatchOutcome = {
  allDronesDestroyed: boolean;
  dronesDestroyed: number;
  dronesRemaining: number;
  reason: "drones-destroyed" | "time-limit";
};

export type MatchStats = {
  shotsFired: number;
  missilesLaunched: number;
  bulletHits: number;
  detonations: number;
  designationChanges: number;
  staleTargetsCleared: number;
};

export type MatchResult = {
  spec: MatchSpec;
  ticks: number;
  simSecondsElapsed: number;
  outcome: MatchOutcome;
  stats: MatchStats;
  modeTicks: Record<EngagementMode, number>;
};

export type BodySnapshot = {
  id: number;
  kind: string;
  team: string;
  x: number;
  y: number;
  vx: number;
  vy: number;
  heading: number;
  health: number;
  alive: boolean;
};

export type MatchSnapshot = {
  tick: number;
  simSeconds: number;
  fighter: {
    mode: EngagementMode;
    designatedTrackId: number | null;
    trackCount: number;
  } | null;
  bodies: BodySnapshot[];
  bullets: number;
};
