import {
  add,
  distance,
  dot,
  fromAngle,
  length,
  scale,
  sub,
  wrapAngle,
  ZERO,
  type ScanPlot,
  type SensorAim,
  type Vec2,
} from "../../../packages/intercept-core/src/index.ts";
import type { Rng } from "../lib/seeded-rng.ts";
import { scanBeam } from "./radar.ts";
import type { Body, BodyCommands, BodyInit, Bullet, StepEvents, Team, WorldSettings } from "./world-types.ts";

function clampMagnitude(v: Vec2, max: number): Vec2 {
  const len = length(v);
  return len > max ? scale(v, max / len) : v;
}

function clamp(value: number, limit: number): number {
  return Math.max(-limit, Math.min(limit, value));
}

/** Distance from `p` to the segment a→b. */
export function segmentDistance(a: Vec2, b: Vec2, p: Vec2): number {
  const ab = sub(b, a);
  const lenSq = dot(ab, ab);
  if (lenSq === 0) {
    return distance(a, p);
  }
  const t = Math.max(0, Math.min(1, dot(sub(p, a), ab) / lenSq));
  return distance(add(a, scale(ab, t)), p);
}

function emptyCommands(): BodyCommands {
  return { linear: null, torque: null, turnRate: null, weapons: new Set<number>(), selfDestruct: false };
}

/**
 * Headless 2D kinematic arena: point-mass bodies, gun rounds, missiles with a
 * proximity blast and a single-return radar. Pilots buffer commands between
 * `step` calls; `step` applies them and advances one tick.
 */
export class ArenaWorld {
  public readonly settings: WorldSettings;
  private readonly rng: Rng;
  private readonly bodyMap = new Map<number, Body>();
  private readonly commandMap = new Map<number, BodyCommands>();
  private bulletList: Bullet[] = [];
  private nextId = 0;
  private tickCount = 0;

  constructor(settings: WorldSettings, rng: Rng) {
    this.settings = settings;
    this.rng = rng;
  }

  public get tick(): number {
    return this.tickCount;
  }

  public get dt(): number {
    return 1 / this.settings.ticksPerSecond;
  }

  public bodies(): Body[] {
    return [...this.bodyMap.values()];
  }

  public bullets(): ReadonlyArray<Bullet> {
    return this.bulletList;
  }

  public body(id: number): Body | undefined {
    return this.bodyMap.get(id);
  }

  public aliveCount(team: Team, kind?: Body["kind"]): number {
    let count = 0;
    for (const body of this.bodyMap.values()) {
      if (body.alive && body.team === team && (kind === undefined || body.kind === kind)) {
        count += 1;
      }
    }
    return count;
  }

  public spawn(init: BodyInit): Body {
    const hull = this.settings.hulls[init.kind];
    const body: Body = {
      id: this.nextId,
      kind: init.kind,
      team: init.team,
      position: init.position,
      velocity: init.velocity ?? ZERO,
      heading: init.heading ?? 0,
      angularVelocity: 0,
      health: hull.health,
      radius: hull.radius,
      alive: true,
      spawnTick: this.tickCount,
      launchedBy: init.launchedBy ?? null,
      missilesLeft: init.kind === "fighter" ? this.settings.missileMagazine : 0,
      gunCooldown: 0,
      missileCooldown: 0,
      sensorAim: null,
    };
    this.nextId += 1;
    this.bodyMap.set(body.id, body);
    return body;
  }

  /** Mutable command buffer for the current tick. */
  public command(id: number): BodyCommands {
    let commands = this.commandMap.get(id);
    if (!commands) {
      commands = emptyCommands();
      this.commandMap.set(id, commands);
    }
    return commands;
  }

  public setSensorAim(id: number, aim: SensorAim): void {
    const body = this.bodyMap.get(id);
    if (body) {
      body.sensorAim = aim;
    }
  }

  /** Radar return for `id` along the beam it set on the previous tick. */
  public scan(id: number): ScanPlot | null {
    const observer = this.bodyMap.get(id);
    if (!observer || !observer.alive) {
      return null;
    }
    const s = this.settings;
    return scanBeam(
      observer,
      this.bodyMap.values(),
      { noise: s.radarNoise, velocityNoise: s.radarVelocityNoise, noiseFloor: s.radarNoiseFloor },
      this.rng,
      this.tickCount,
    );
  }

  public step(): StepEvents {
    const events: StepEvents = { tick: this.tickCount + 1, shots: [], launched: [], hits: [], detonations: [], destroyed: [] };
    const dt = this.dt;

    for (const body of [...this.bodyMap.values()]) {
      if (!body.alive) {
        continue;
      }
      const commands = this.commandMap.get(body.id) ?? emptyCommands();
      this.integrate(body, commands, dt);
      this.fireWeapons(body, commands, events);
      if (commands.selfDestruct) {
        this.detonate(body, events);
        continue;
      }
      if (body.kind === "missile" && this.tickCount + 1 - body.spawnTick >= this.settings.missileLifetimeTicks) {
        body.alive = false;
        events.destroyed.push(body.id);
      }
    }

    this.advanceBullets(events, dt);

    for (const body of this.bodyMap.values()) {
      if (body.alive && body.health <= 0) {
        body.alive = false;
        events.destroyed.push(body.id);
      }
    }

    this.commandMap.clear();
    this.tickCount += 1;
    return events;
  }

  private integrate(body: Body, commands: BodyCommands, dt: number): void {
    const hull = this.settings.hulls[body.kind];
    if (commands.turnRate !== null) {
      body.angularVelocity = clamp(commands.turnRate, hull.maxTurnRate);
    } else if (commands.torque !== null) {
      body.angularVelocity = clamp(body.angularVelocity + clamp(commands.torque, hull.maxAngularAccel) * dt, hull.maxTurnRate);
    }
    body.heading = wrapAngle(body.heading + body.angularVelocity * dt);

    const accel = clampMagnitude(commands.linear ?? ZERO, hull.maxAccel);
    body.velocity = add(body.velocity, scale(accel, dt));
    body.position = add(body.position, scale(body.velocity, dt));

    // Bounce off the arena walls.
    const h = this.settings.halfSize;
    if (Math.abs(body.position.x) > h) {
      body.position = { x: Math.sign(body.position.x) * h, y: body.position.y };
      body.velocity = { x: -body.velocity.x, y: body.velocity.y };
    }
    if (Math.abs(body.position.y) > h) {
      body.position = { x: body.position.x, y: Math.sign(body.position.y) * h };
      body.velocity = { x: body.velocity.x, y: -body.velocity.y };
    }
  }

  private fireWeapons(body: Body, commands: BodyCommands, events: StepEvents): void {
    const s = this.settings;
    if (body.gunCooldown > 0) {
      body.gunCooldown -= 1;
    }
    if (body.missileCooldown > 0) {
      body.missileCooldown -= 1;
    }
    if (body.kind !== "fighter") {
      return;
    }
    if (commands.weapons.has(s.gunIndex) && body.gunCooldown === 0) {
      this.bulletList.push({
        position: body.position,
        velocity: add(body.velocity, fromAngle(body.heading, s.projectileSpeed)),
        team: body.team,
        ownerId: body.id,
        ttl: s.bulletLifetimeTicks,
      });
      body.gunCooldown = s.gunCooldownTicks;
      events.shots.push(body.id);
    }
    if (commands.weapons.has(s.missileIndex) && body.missileCooldown === 0 && body.missilesLeft > 0) {
      const missile = this.spawn({
        kind: "missile",
        team: body.team,
        position: body.position,
        velocity: body.velocity,
        heading: body.heading,
        launchedBy: body.id,
      });
      missile.sensorAim = body.sensorAim;
      body.missilesLeft -= 1;
      body.missileCooldown = s.missileCooldownTicks;
      events.launched.push(missile.id);
    }
  }

  private detonate(body: Body, events: StepEvents): void {
    body.alive = false;
    events.detonations.push(body.id);
    events.destroyed.push(body.id);
    for (const other of this.bodyMap.values()) {
      if (other.alive && other.team !== body.team && distance(other.position, body.position) <= this.settings.blastRadius) {
        other.health -= this.settings.blastDamage;
      }
    }
  }

  private advanceBullets(events: StepEvents, dt: number): void {
    const remaining: Bullet[] = [];
    for (const bullet of this.bulletList) {
      const from = bullet.position;
      bullet.position = add(from, scale(bullet.velocity, dt));
      bullet.ttl -= 1;
      let hit = false;
      for (const body of this.bodyMap.values()) {
        if (!body.alive || body.team === bullet.team) {
          continue;
        }
        if (segmentDistance(from, bullet.position, body.position) <= body.radius) {
          body.health -= this.settings.bulletDamage;
          events.hits.push({ ownerId: bullet.ownerId, targetId: body.id });
          hit = true;
          break;
        }
      }
      if (!hit && bullet.ttl > 0) {
        remaining.push(bullet);
      }
    }
    this.bulletList = remaining;
  }
}
