import type { GuidanceConfig } from "../config/guidance-config.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";
import type { Vec2 } from "../math/vec2.ts";
import type { IngestReport, Tracker } from "../tracking/tracker.ts";
import type { SensorAim } from "../types.ts";
import { advancingSweep, lockSweep } from "./radar-sweep.ts";

export type EngagementMode = "no-target" | "searching" | "engaged" | "out-of-target-range" | "out-of-radar-range";

export type EngagementSettings = Pick<
  GuidanceConfig,
  "stickyTargetTicks" | "radarLossTicks" | "maxEngagementRange" | "searchSweep" | "longRangeSweep" | "lockMinWidth" | "lockMaxWidth"
>;

export interface Designation {
  trackId: number;
  stickyTicks: number;
}

export interface EngagementUpdate {
  mode: EngagementMode;
  previousMode: EngagementMode;
  designatedTrackId: number | null;
  staleTargetCleared: boolean;
  designationChanged: boolean;
}

/**
 * Chooses the operating mode and the designated track each tick. A designation
 * is held for `stickyTargetTicks` ticks before the nearest track may replace
 * it; a designation whose track was pruned is dropped at once and the next
 * acquisition skips the hold.
 */
export class EngagementMachine {
  private modeValue: EngagementMode = "no-target";
  private designation: Designation | null = null;
  private lastSweep: SensorAim;
  private readonly settings: EngagementSettings;
  private readonly logger: Logger;

  constructor(settings: EngagementSettings, logger: Logger = silentLogger) {
    this.settings = settings;
    this.logger = logger;
    this.lastSweep = {
      heading: 0,
      width: 0,
      minRange: settings.searchSweep.minRange,
      maxRange: settings.searchSweep.maxRange,
    };
  }

  public get mode(): EngagementMode {
    return this.modeValue;
  }

  public get designatedTrackId(): number | null {
    return this.designation?.trackId ?? null;
  }

  public get stickyTicksRemaining(): number {
    return this.designation?.stickyTicks ?? 0;
  }

  public update(tracker: Tracker, report: IngestReport, ownPosition: Vec2): EngagementUpdate {
    const previousMode = this.modeValue;
    const previousTarget = this.designatedTrackId;
    let staleTargetCleared = false;

    if (this.designation && (report.pruned.includes(this.designation.trackId) || !tracker.has(this.designation.trackId))) {
      this.logger.debug("designated track lost", { track: this.designation.trackId, tick: report.tick });
      this.designation = null;
      staleTargetCleared = true;
    }

    if (tracker.hasContacts()) {
      this.modeValue = "engaged";
      this.designate(tracker, ownPosition);
      const target = this.designation ? tracker.find(this.designation.trackId) : undefined;
      if (target && target.distanceFrom(ownPosition) > this.settings.maxEngagementRange) {
        this.modeValue = "out-of-target-range";
      }
    } else if (tracker.ticksSinceContact > this.settings.radarLossTicks) {
      this.modeValue = "out-of-radar-range";
    } else if (previousMode === "engaged" || previousMode === "out-of-target-range") {
      this.modeValue = "searching";
    }

    if (this.modeValue !== previousMode) {
      this.logger.debug("mode change", { from: previousMode, to: this.modeValue, tick: report.tick });
    }

    const designatedTrackId = this.designatedTrackId;
    return {
      mode: this.modeValue,
      previousMode,
      designatedTrackId,
      staleTargetCleared,
      designationChanged: designatedTrackId !== previousTarget,
    };
  }

  /** Sensor cone for the next tick given the current mode and designation. */
  public sweepFor(tracker: Tracker, ownPosition: Vec2): SensorAim {
    let sweep: SensorAim;
    const target = this.designation ? tracker.find(this.designation.trackId) : undefined;
    if ((this.modeValue === "engaged" || this.modeValue === "out-of-target-range") && target) {
      sweep = lockSweep(ownPosition, target.position, this.settings);
    } else if (this.modeValue === "out-of-radar-range") {
      sweep = advancingSweep(this.lastSweep, this.settings.longRangeSweep);
    } else {
      sweep = advancingSweep(this.lastSweep, this.settings.searchSweep);
    }
    this.lastSweep = sweep;
    return sweep;
  }

  public reset(): void {
    this.modeValue = "no-target";
    this.designation = null;
  }

  private designate(tracker: Tracker, ownPosition: Vec2): void {
    if (this.designation && this.designation.stickyTicks > 0) {
      this.designation.stickyTicks -= 1;
      return;
    }
    const nearestId = tracker.nearest(ownPosition);
    if (nearestId === null) {
      this.designation = null;
      return;
    }
    if (this.designation?.trackId !== nearestId) {
      this.logger.debug("designating track", { track: nearestId });
    }
    this.designation = { trackId: nearestId, stickyTicks: this.settings.stickyTargetTicks };
  }
}
