import {
  createShipRole,
  fromAngle,
  length,
  resolveGuidanceConfig,
  silentLogger,
  tickShip,
  ZERO,
  type EngagementMode,
  type GuidanceConfig,
  type GuidanceHost,
  type GuidanceReport,
  type IdleBehavior,
  type Logger,
  type ShipKind,
  type ShipRole,
} from "../../../packages/intercept-core/src/index.ts";
import { mulberry32, randomRange, type Rng } from "../lib/seeded-rng.ts";
import { ArenaWorld } from "../sim/arena-world.ts";
import { createBodyHost } from "../sim/body-host.ts";
import { DEFAULT_WORLD_SETTINGS, type StepEvents } from "../sim/world-types.ts";
import type { DronePlacement, MatchResult, MatchSnapshot, MatchSpec, MatchStats } from "./match-types.ts";

type Pilot = {
  bodyId: number;
  role: ShipRole;
  host: GuidanceHost;
};

const PATROL_SPEED = 100;
const PATROL_ACCEL = 20;
const PATROL_TURN_RATE = 0.3;

/** Slow circling patrol while the fighter has nothing to chase. */
const patrol: IdleBehavior = (host, self) => {
  if (length(self.velocity) < PATROL_SPEED) {
    host.actuateLinear(fromAngle(self.heading, PATROL_ACCEL));
  }
  host.actuateTurnRate(PATROL_TURN_RATE);
};

function placeDrones(spec: MatchSpec, rng: Rng): DronePlacement[] {
  if (spec.placements) {
    return spec.placements;
  }
  const out: DronePlacement[] = [];
  for (let i = 0; i < spec.drones; i += 1) {
    const bearing = randomRange(rng, -Math.PI, Math.PI);
    const range = randomRange(rng, 1500, 6000);
    const course = randomRange(rng, -Math.PI, Math.PI);
    const at = fromAngle(bearing, range);
    const v = fromAngle(course, spec.droneSpeed);
    out.push({ x: at.x, y: at.y, vx: v.x, vy: v.y });
  }
  return out;
}

function emptyModeTicks(): Record<EngagementMode, number> {
  return { "no-target": 0, searching: 0, engaged: 0, "out-of-target-range": 0, "out-of-radar-range": 0 };
}

/**
 * One fighter against scripted drones. The runner owns the world and one
 * guidance role per piloted body; missiles get a pilot when they launch.
 */
export class MatchRunner {
  public readonly spec: MatchSpec;
  public readonly world: ArenaWorld;
  private readonly config: GuidanceConfig;
  private readonly logger: Logger;
  private readonly pilots = new Map<number, Pilot>();
  private readonly maxTicks: number;
  private readonly droneCount: number;
  private readonly stats: MatchStats = {
    shotsFired: 0,
    missilesLaunched: 0,
    bulletHits: 0,
    detonations: 0,
    designationChanges: 0,
    staleTargetsCleared: 0,
  };
  private readonly modeTicks = emptyModeTicks();
  private lastFighterReport: GuidanceReport | null = null;

  constructor(spec: MatchSpec, logger: Logger = silentLogger) {
    this.spec = spec;
    this.logger = logger;
    this.config = resolveGuidanceConfig(spec.guidance);
    const rng = mulberry32(spec.seed);
    this.world = new ArenaWorld(
      {
        ...DEFAULT_WORLD_SETTINGS,
        ticksPerSecond: this.config.ticksPerSecond,
        projectileSpeed: this.config.projectileSpeed,
        gunIndex: this.config.gunIndex,
        missileIndex: this.config.missileIndex,
        radarNoise: spec.radarNoise,
        radarVelocityNoise: spec.radarNoise * 0.4,
      },
      rng,
    );

    const fighter = this.world.spawn({ kind: "fighter", team: "blue", position: ZERO });
    this.addPilot(fighter.id, "fighter");
    const placements = placeDrones(spec, rng);
    for (const p of placements) {
      this.world.spawn({ kind: "drone", team: "red", position: { x: p.x, y: p.y }, velocity: { x: p.vx, y: p.vy } });
    }
    this.droneCount = placements.length;
    this.maxTicks = Math.max(1, Math.round(spec.maxSimSeconds * this.config.ticksPerSecond));
  }

  public get tick(): number {
    return this.world.tick;
  }

  public get terminal(): boolean {
    return this.world.tick >= this.maxTicks || this.world.aliveCount("red", "drone") === 0;
  }

  /** Runs every pilot once, then advances the world. Returns null once terminal. */
  public step(): StepEvents | null {
    if (this.terminal) {
      return null;
    }
    for (const pilot of [...this.pilots.values()]) {
      const report = tickShip(pilot.role, pilot.host);
      if (pilot.role.kind === "fighter") {
        this.recordFighter(report);
      }
    }

    const events = this.world.step();
    this.stats.shotsFired += events.shots.length;
    this.stats.missilesLaunched += events.launched.length;
    this.stats.bulletHits += events.hits.length;
    this.stats.detonations += events.detonations.length;
    for (const id of events.launched) {
      this.addPilot(id, "missile");
      this.logger.debug("missile away", { body: id, tick: events.tick });
    }
    for (const id of events.destroyed) {
      this.pilots.delete(id);
      const body = this.world.body(id);
      if (body?.kind === "drone") {
        this.logger.info("drone destroyed", { body: id, tick: events.tick });
      }
    }
    return events;
  }

  public result(): MatchResult {
    const dronesRemaining = this.world.aliveCount("red", "drone");
    const allDronesDestroyed = dronesRemaining === 0;
    return {
      spec: this.spec,
      ticks: this.world.tick,
      simSecondsElapsed: this.world.tick / this.config.ticksPerSecond,
      outcome: {
        allDronesDestroyed,
        dronesDestroyed: this.droneCount - dronesRemaining,
        dronesRemaining,
        reason: allDronesDestroyed ? "drones-destroyed" : "time-limit",
      },
      stats: { ...this.stats },
      modeTicks: { ...this.modeTicks },
    };
  }

  public snapshot(): MatchSnapshot {
    const last = this.lastFighterReport;
    return {
      tick: this.world.tick,
      simSeconds: this.world.tick / this.config.ticksPerSecond,
      fighter: last ? { mode: last.mode, designatedTrackId: last.designatedTrackId, trackCount: last.trackCount } : null,
      bodies: this.world.bodies().map((body) => ({
        id: body.id,
        kind: body.kind,
        team: body.team,
        x: body.position.x,
        y: body.position.y,
        vx: body.velocity.x,
        vy: body.velocity.y,
        heading: body.heading,
        health: body.health,
        alive: body.alive,
      })),
      bullets: this.world.bullets().length,
    };
  }

  private addPilot(bodyId: number, kind: ShipKind): void {
    const role = createShipRole(kind, {
      config: this.config,
      logger: this.logger.child(`${kind}#${bodyId}`),
      ...(kind === "fighter" ? { onIdle: patrol } : {}),
    });
    this.pilots.set(bodyId, { bodyId, role, host: createBodyHost(this.world, bodyId) });
  }

  private recordFighter(report: GuidanceReport): void {
    this.modeTicks[report.mode] += 1;
    if (report.staleTargetCleared) {
      this.stats.staleTargetsCleared += 1;
    }
    const previous = this.lastFighterReport?.designatedTrackId ?? null;
    if (report.designatedTrackId !== null && report.designatedTrackId !== previous) {
      this.stats.designationChanges += 1;
    }
    this.lastFighterReport = report;
  }
}

export function runMatch(spec: MatchSpec, logger: Logger = silentLogger): MatchResult {
  const runner = new MatchRunner(spec, logger);
  while (!runner.terminal) {
    runner.step();
  }
  const result = runner.result();
  logger.info("match finished", {
    seed: spec.seed,
    ticks: result.ticks,
    destroyed: result.outcome.dronesDestroyed,
    reason: result.outcome.reason,
  });
  return result;
}
