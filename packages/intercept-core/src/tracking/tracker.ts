import type { GuidanceConfig } from "../config/guidance-config.ts";
import { TrackLookupError } from "../errors.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";
import type { Vec2 } from "../math/vec2.ts";
import type { ScanPlot } from "../types.ts";
import { Track, type TrackSnapshot } from "./track.ts";

export type TrackerSettings = Pick<GuidanceConfig, "ticksPerSecond" | "gateSize" | "confirmationHits" | "stalenessTicks">;

export interface IngestReport {
  tick: number;
  claimedBy: number | null;
  spawned: number | null;
  pruned: number[];
}

/**
 * Owns every track of one agent. Other components hold track ids only and
 * resolve them here on each use.
 */
export class Tracker {
  private readonly trackMap = new Map<number, Track>();
  private readonly settings: TrackerSettings;
  private readonly logger: Logger;
  private nextId = 0;
  private tickCount = 0;
  private sinceContact = 0;

  constructor(settings: TrackerSettings, logger: Logger = silentLogger) {
    this.settings = settings;
    this.logger = logger;
  }

  public get tick(): number {
    return this.tickCount;
  }

  /** Ticks since the last tick that delivered a plot. */
  public get ticksSinceContact(): number {
    return this.sinceContact;
  }

  public get size(): number {
    return this.trackMap.size;
  }

  public hasContacts(): boolean {
    return this.trackMap.size > 0;
  }

  public has(id: number): boolean {
    return this.trackMap.has(id);
  }

  public find(id: number): Track | undefined {
    return this.trackMap.get(id);
  }

  public get(id: number): Track {
    const track = this.trackMap.get(id);
    if (!track) {
      throw new TrackLookupError(id);
    }
    return track;
  }

  public tracks(): Track[] {
    return [...this.trackMap.values()];
  }

  /**
   * Returns the id of the track closest to `point`, or null when there are no
   * tracks. Ties resolve to the earliest-created track.
   */
  public nearest(point: Vec2): number | null {
    let bestId: number | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const [id, track] of this.trackMap) {
      const d = track.distanceFrom(point);
      if (d < bestDistance) {
        bestDistance = d;
        bestId = id;
      }
    }
    return bestId;
  }

  /**
   * One tick of track maintenance: coast every track, associate the plot with
   * the first gate that strictly contains it (or spawn a track), then prune
   * tracks whose contact is stale.
   */
  public ingest(plot: ScanPlot | null): IngestReport {
    this.tickCount += 1;
    const tick = this.tickCount;
    this.sinceContact = plot ? 0 : this.sinceContact + 1;

    for (const track of this.trackMap.values()) {
      track.update();
    }

    let claimedBy: number | null = null;
    let spawned: number | null = null;
    if (plot) {
      for (const track of this.trackMap.values()) {
        if (track.checkGate(plot.position)) {
          track.pushPlot(plot, tick);
          track.update();
          claimedBy = track.id;
          this.logger.debug("plot associated", { track: track.id, tick });
          break;
        }
      }
      if (claimedBy === null) {
        spawned = this.spawn(plot, tick).id;
      }
    }

    const pruned: number[] = [];
    for (const [id, track] of this.trackMap) {
      if (track.ticksSinceContact(tick) >= this.settings.stalenessTicks) {
        pruned.push(id);
      }
    }
    for (const id of pruned) {
      this.trackMap.delete(id);
      this.logger.debug("track pruned", { track: id, tick });
    }

    return { tick, claimedBy, spawned, pruned };
  }

  public snapshot(): TrackSnapshot[] {
    return this.tracks().map((track) => track.snapshot());
  }

  private spawn(plot: ScanPlot, tick: number): Track {
    const id = this.nextId;
    this.nextId += 1;
    const track = new Track(id, plot, tick, this.settings, this.logger);
    this.trackMap.set(id, track);
    this.logger.debug("track spawned", { track: id, tick, x: plot.position.x, y: plot.position.y });
    return track;
  }
}
