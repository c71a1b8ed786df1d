import {
  GuidanceConfigError,
  resolveGuidanceConfig,
  type GuidanceConfigOverrides,
} from "../../../packages/intercept-core/src/index.ts";
import type { ArenaDefaults } from "../config/arena-config.ts";
import { asNumber, asRecord } from "../lib/parse-values.ts";
import type { DronePlacement, MatchSpec } from "./match-types.ts";

export class MatchSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MatchSpecError";
  }
}

const NUMERIC_GUIDANCE_KEYS = [
  "stickyTargetTicks",
  "stalenessTicks",
  "gateSize",
  "radarLossTicks",
  "maxEngagementRange",
  "closeRange",
  "holdRange",
  "fireRange",
  "projectileSpeed",
  "missileTurnGain",
  "missileAccelGain",
  "detonationRange",
] as const;

export const DEFAULT_MATCH_SPEC: Readonly<Omit<MatchSpec, "seed">> = {
  maxSimSeconds: 120,
  drones: 3,
  droneSpeed: 120,
  radarNoise: 5,
  guidance: {},
};

function parseGuidance(value: unknown): GuidanceConfigOverrides {
  const raw = asRecord(value);
  const out: GuidanceConfigOverrides = {};
  for (const key of NUMERIC_GUIDANCE_KEYS) {
    const n = asNumber(raw[key]);
    if (n !== undefined) {
      out[key] = n;
    }
  }
  if (typeof raw.launchMissiles === "boolean") {
    out.launchMissiles = raw.launchMissiles;
  }
  return out;
}

/** Rejects overrides the guidance core would refuse when the match starts. */
function checkGuidance(guidance: GuidanceConfigOverrides): GuidanceConfigOverrides {
  try {
    resolveGuidanceConfig(guidance);
  } catch (err) {
    if (err instanceof GuidanceConfigError) {
      throw new MatchSpecError(err.message);
    }
    throw err;
  }
  return guidance;
}

function parsePlacements(value: unknown): DronePlacement[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new MatchSpecError("placements must be an array");
  }
  return value.map((entry, index): DronePlacement => {
    const rec = asRecord(entry);
    const x = asNumber(rec.x);
    const y = asNumber(rec.y);
    if (x === undefined || y === undefined) {
      throw new MatchSpecError(`placements[${index}] needs numeric x and y`);
    }
    return { x, y, vx: asNumber(rec.vx) ?? 0, vy: asNumber(rec.vy) ?? 0 };
  });
}

/** Builds a full match spec from an untrusted JSON body and the arena defaults. */
export function normalizeMatchSpec(raw: unknown, defaults: ArenaDefaults = {}): MatchSpec {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new MatchSpecError("match spec must be a JSON object");
  }
  const rec = asRecord(raw);
  const seed = asNumber(rec.seed) ?? defaults.seed ?? Date.now() % 1_000_000;
  const maxSimSeconds = asNumber(rec.maxSimSeconds) ?? defaults.maxSimSeconds ?? DEFAULT_MATCH_SPEC.maxSimSeconds;
  const drones = asNumber(rec.drones) ?? defaults.drones ?? DEFAULT_MATCH_SPEC.drones;
  const droneSpeed = asNumber(rec.droneSpeed) ?? defaults.droneSpeed ?? DEFAULT_MATCH_SPEC.droneSpeed;
  const radarNoise = asNumber(rec.radarNoise) ?? defaults.radarNoise ?? DEFAULT_MATCH_SPEC.radarNoise;
  if (maxSimSeconds <= 0) {
    throw new MatchSpecError("maxSimSeconds must be positive");
  }
  if (!Number.isInteger(drones) || drones < 0) {
    throw new MatchSpecError("drones must be a non-negative integer");
  }
  if (radarNoise < 0) {
    throw new MatchSpecError("radarNoise must not be negative");
  }
  const placements = parsePlacements(rec.placements);
  return {
    seed: Math.floor(seed),
    maxSimSeconds,
    drones: placements ? placements.length : drones,
    droneSpeed,
    radarNoise,
    guidance: checkGuidance(parseGuidance(rec.guidance)),
    ...(placements ? { placements } : {}),
  };
}
