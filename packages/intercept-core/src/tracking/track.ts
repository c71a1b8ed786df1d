import { add, average, distance, div, scale, sub, type Vec2 } from "../math/vec2.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";
import type { ScanPlot, TrackClass } from "../types.ts";
import { TrackGate } from "./track-gate.ts";

export interface TrackSettings {
  ticksPerSecond: number;
  gateSize: number;
  confirmationHits: number;
}

export interface TrackSnapshot {
  id: number;
  position: Vec2;
  velocity: Vec2;
  heading: number;
  classification: TrackClass;
  lastContactTick: number;
  hits: number;
  gate: { center: Vec2; radius: number };
}

export type TrackUpdateKind = "coast" | "measurement" | "merged";

export class Track {
  public readonly id: number;
  private resolvedPosition: Vec2;
  private resolvedVelocity: Vec2;
  private classificationValue: TrackClass;
  private contactTick: number;
  private hitCount: number;
  private readonly gateValue: TrackGate;
  private readonly scans: ScanPlot[];
  private readonly settings: TrackSettings;
  private readonly logger: Logger;

  constructor(id: number, seed: ScanPlot, tick: number, settings: TrackSettings, logger: Logger = silentLogger) {
    this.id = id;
    this.resolvedPosition = seed.position;
    this.resolvedVelocity = seed.velocity;
    this.classificationValue = "tentative";
    this.contactTick = tick;
    this.hitCount = 1;
    this.gateValue = new TrackGate(seed.position, settings.gateSize);
    this.scans = [];
    this.settings = settings;
    this.logger = logger;
    this.classify(seed);
  }

  public get position(): Vec2 {
    return this.resolvedPosition;
  }

  public get velocity(): Vec2 {
    return this.resolvedVelocity;
  }

  public get heading(): number {
    return Math.atan2(this.resolvedVelocity.y, this.resolvedVelocity.x);
  }

  public get classification(): TrackClass {
    return this.classificationValue;
  }

  public get gate(): TrackGate {
    return this.gateValue;
  }

  public get lastContactTick(): number {
    return this.contactTick;
  }

  public get hits(): number {
    return this.hitCount;
  }

  public get pendingPlots(): number {
    return this.scans.length;
  }

  public checkGate(point: Vec2): boolean {
    return this.gateValue.pointInGate(point);
  }

  public distanceFrom(point: Vec2): number {
    return distance(this.resolvedPosition, point);
  }

  public ticksSinceContact(tick: number): number {
    return tick - this.contactTick;
  }

  /** Queues an associated plot and stamps the contact tick. */
  public pushPlot(plot: ScanPlot, tick: number): void {
    this.scans.push(plot);
    this.contactTick = tick;
    this.hitCount += 1;
    this.classify(plot);
  }

  /**
   * Advances the estimate one tick. With no queued plot the velocity is
   * coasted; with one plot a one-step differencing smoother is applied. The
   * gate follows the resolved position either way.
   */
  public update(): TrackUpdateKind {
    const tps = this.settings.ticksPerSecond;
    let kind: TrackUpdateKind;
    if (this.scans.length === 0) {
      this.resolvedPosition = add(this.resolvedPosition, div(this.resolvedVelocity, tps));
      kind = "coast";
    } else {
      const [first] = this.scans;
      let measurement: ScanPlot;
      if (this.scans.length === 1 && first) {
        measurement = first;
        kind = "measurement";
      } else {
        this.logger.warn("merging plots queued in a single tick", { track: this.id, plots: this.scans.length });
        measurement = mergePlots(this.scans);
        kind = "merged";
      }
      this.scans.length = 0;
      const currentPerTick = div(this.resolvedVelocity, tps);
      const acceleration = derivedAcceleration(this.resolvedVelocity, measurement.velocity, tps);
      this.resolvedVelocity = scale(add(currentPerTick, acceleration), tps);
      this.resolvedPosition = add(this.resolvedPosition, acceleration);
    }
    this.gateValue.updateCenter(this.resolvedPosition);
    return kind;
  }

  public snapshot(): TrackSnapshot {
    return {
      id: this.id,
      position: this.resolvedPosition,
      velocity: this.resolvedVelocity,
      heading: this.heading,
      classification: this.classificationValue,
      lastContactTick: this.contactTick,
      hits: this.hitCount,
      gate: { center: this.gateValue.center, radius: this.gateValue.radius },
    };
  }

  private classify(plot: ScanPlot): void {
    if (this.classificationValue === "munition" || this.classificationValue === "friend") {
      return;
    }
    if (plot.reportedClass === "missile") {
      this.classificationValue = "munition";
    } else if (plot.friendly === true) {
      this.classificationValue = "friend";
    } else if (this.hitCount >= this.settings.confirmationHits) {
      this.classificationValue = "foe";
    }
  }
}

/** Per-tick acceleration implied by the difference between the estimate and a measured velocity. */
export function derivedAcceleration(currentVelocity: Vec2, measuredVelocity: Vec2, ticksPerSecond: number): Vec2 {
  return div(sub(div(currentVelocity, ticksPerSecond), div(measuredVelocity, ticksPerSecond)), 2);
}

function mergePlots(plots: ReadonlyArray<ScanPlot>): ScanPlot {
  const last = plots[plots.length - 1];
  return {
    position: average(plots.map((p) => p.position)),
    velocity: average(plots.map((p) => p.velocity)),
    snr: Math.max(...plots.map((p) => p.snr)),
    rssi: Math.max(...plots.map((p) => p.rssi)),
    tick: last ? last.tick : 0,
  };
}
