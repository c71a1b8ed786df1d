export interface TurnProfile {
  coarseGain: number;
  fineGain: number;
  /** Heading error above which the coarse gain drives the turn. */
  coarseTolerance: number;
  /** Heading error at or below which the turn is held by rate and the trigger may fire. */
  fireTolerance: number;
  /** Proportional gain of the direct rate command used once converged, 1/s. */
  rateGain: number;
}

export interface SweepProfile {
  width: number;
  minRange: number;
  maxRange: number;
}

export interface GuidanceConfig {
  ticksPerSecond: number;
  projectileSpeed: number;
  stalenessTicks: number;
  stickyTargetTicks: number;
  gateSize: number;
  confirmationHits: number;
  radarLossTicks: number;
  maxEngagementRange: number;
  closeRange: number;
  holdRange: number;
  fireRange: number;
  muzzleOffset: number;
  maxForwardAcceleration: number;
  detonationRange: number;
  missileTurnGain: number;
  missileAccelGain: number;
  /** Iteration bound of the fixed-point intercept cross-check. */
  interceptIterations: number;
  gunIndex: number;
  missileIndex: number;
  launchMissiles: boolean;
  farTurn: TurnProfile;
  closeTurn: TurnProfile;
  searchSweep: SweepProfile;
  longRangeSweep: SweepProfile;
  lockMinWidth: number;
  lockMaxWidth: number;
}

export type GuidanceConfigOverrides = Partial<Omit<GuidanceConfig, "farTurn" | "closeTurn" | "searchSweep" | "longRangeSweep">> & {
  farTurn?: Partial<TurnProfile>;
  closeTurn?: Partial<TurnProfile>;
  searchSweep?: Partial<SweepProfile>;
  longRangeSweep?: Partial<SweepProfile>;
};

export const DEFAULT_GUIDANCE_CONFIG: Readonly<GuidanceConfig> = {
  ticksPerSecond: 60,
  projectileSpeed: 1000,
  stalenessTicks: 30,
  stickyTargetTicks: 1,
  gateSize: 50,
  confirmationHits: 3,
  radarLossTicks: 30,
  maxEngagementRange: 10_000,
  closeRange: 1000,
  holdRange: 500,
  fireRange: 1000,
  muzzleOffset: 1.33333333,
  maxForwardAcceleration: 60,
  detonationRange: 20,
  missileTurnGain: 10,
  missileAccelGain: 100,
  interceptIterations: 10,
  gunIndex: 0,
  missileIndex: 1,
  launchMissiles: true,
  farTurn: { coarseGain: 50, fineGain: 1000, coarseTolerance: 0.1, fireTolerance: 0.01, rateGain: 30 },
  closeTurn: { coarseGain: 4, fineGain: 10, coarseTolerance: 0.1, fireTolerance: 0.01, rateGain: 30 },
  searchSweep: { width: Math.PI / 4, minRange: 25, maxRange: 10_000 },
  longRangeSweep: { width: Math.PI / 8, minRange: 25, maxRange: 1_000_000 },
  lockMinWidth: 0.005,
  lockMaxWidth: Math.PI / 4,
};

export class GuidanceConfigError extends Error {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`invalid guidance config: ${field} ${message}`);
    this.name = "GuidanceConfigError";
    this.field = field;
  }
}

function requirePositive(config: GuidanceConfig, field: keyof GuidanceConfig): void {
  const value = config[field];
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new GuidanceConfigError(String(field), `must be a positive finite number (got ${String(value)})`);
  }
}

function requireNonNegativeInt(config: GuidanceConfig, field: keyof GuidanceConfig): void {
  const value = config[field];
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new GuidanceConfigError(String(field), `must be a non-negative integer (got ${String(value)})`);
  }
}

function requireIntInRange(config: GuidanceConfig, field: keyof GuidanceConfig, min: number, max: number): void {
  const value = config[field];
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new GuidanceConfigError(String(field), `must be an integer in [${min}, ${max}] (got ${String(value)})`);
  }
}

export function validateGuidanceConfig(config: GuidanceConfig): GuidanceConfig {
  requirePositive(config, "ticksPerSecond");
  requirePositive(config, "projectileSpeed");
  requirePositive(config, "gateSize");
  requirePositive(config, "stalenessTicks");
  requireNonNegativeInt(config, "stickyTargetTicks");
  requireNonNegativeInt(config, "confirmationHits");
  requireNonNegativeInt(config, "radarLossTicks");
  requireIntInRange(config, "interceptIterations", 10, 20);
  if (config.lockMinWidth <= 0 || config.lockMinWidth > config.lockMaxWidth) {
    throw new GuidanceConfigError("lockMinWidth", "must be positive and not above lockMaxWidth");
  }
  return config;
}

export function resolveGuidanceConfig(overrides: GuidanceConfigOverrides = {}): GuidanceConfig {
  const base = DEFAULT_GUIDANCE_CONFIG;
  return validateGuidanceConfig({
    ...base,
    ...overrides,
    farTurn: { ...base.farTurn, ...overrides.farTurn },
    closeTurn: { ...base.closeTurn, ...overrides.closeTurn },
    searchSweep: { ...base.searchSweep, ...overrides.searchSweep },
    longRangeSweep: { ...base.longRangeSweep, ...overrides.longRangeSweep },
  });
}
