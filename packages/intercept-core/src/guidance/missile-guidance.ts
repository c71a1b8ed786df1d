import { turnRateTo } from "../control/angular-controller.ts";
import type { GuidanceConfig } from "../config/guidance-config.ts";
import { EngagementMachine } from "../engagement/engagement-machine.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";
import { add, angleOf, length, scale, sub } from "../math/vec2.ts";
import { Tracker } from "../tracking/tracker.ts";
import type { GuidanceHost } from "../types.ts";
import type { GuidanceOptions, GuidanceReport, IdleBehavior } from "./guidance-report.ts";

/** Pursuit guidance for a self-guided munition: steer on the line of sight, thrust on position plus velocity error. */
export class MissileGuidance {
  public readonly tracker: Tracker;
  public readonly engagement: EngagementMachine;
  private readonly config: GuidanceConfig;
  private readonly logger: Logger;
  private readonly onIdle: IdleBehavior | null;

  constructor(options: GuidanceOptions) {
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.onIdle = options.onIdle ?? null;
    this.tracker = new Tracker(this.config, this.logger.child("tracker"));
    this.engagement = new EngagementMachine(this.config, this.logger.child("engagement"));
  }

  public tick(host: GuidanceHost): GuidanceReport {
    const self = host.selfKinematics();
    const report = this.tracker.ingest(host.sense());
    const update = this.engagement.update(this.tracker, report, self.position);
    const target = update.designatedTrackId === null ? undefined : this.tracker.find(update.designatedTrackId);

    let detonated = false;
    if (target) {
      const dp = sub(target.position, self.position);
      const dv = sub(target.velocity, self.velocity);
      host.actuateTurnRate(turnRateTo(self.heading, angleOf(dp), this.config.missileTurnGain));
      host.actuateLinear(scale(add(dp, dv), this.config.missileAccelGain));
      if (length(dp) < this.config.detonationRange) {
        host.triggerSelfDestruct();
        detonated = true;
        this.logger.debug("detonating", { track: target.id, range: length(dp) });
      }
    } else if (update.mode === "no-target") {
      this.onIdle?.(host, self);
    }

    host.setSensorAim(this.engagement.sweepFor(this.tracker, self.position));

    return {
      role: "missile",
      tick: report.tick,
      mode: update.mode,
      designatedTrackId: update.designatedTrackId,
      staleTargetCleared: update.staleTargetCleared,
      trackCount: this.tracker.size,
      turnPhase: null,
      maneuver: null,
      aim: null,
      firedGun: false,
      launchedMissile: false,
      detonated,
    };
  }
}
