import { planTurn, type TurnCommand } from "../control/angular-controller.ts";
import type { GuidanceConfig } from "../config/guidance-config.ts";
import { EngagementMachine } from "../engagement/engagement-machine.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";
import { angleOf, length, sub, type Vec2 } from "../math/vec2.ts";
import { resolveAimPoint, type InterceptSolution } from "../shooting/intercept-solver.ts";
import type { Track } from "../tracking/track.ts";
import { Tracker } from "../tracking/tracker.ts";
import type { GuidanceHost, SelfKinematics } from "../types.ts";
import { muzzlePoint } from "./geometry.ts";
import type { GuidanceOptions, GuidanceReport, IdleBehavior } from "./guidance-report.ts";
import { computeManeuver, type ManeuverBand } from "./maneuver.ts";

interface EngageOutcome {
  turn: TurnCommand;
  aim: InterceptSolution;
  maneuver: ManeuverBand;
  firedGun: boolean;
  launchedMissile: boolean;
}

export class FighterGuidance {
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
    const origin = muzzlePoint(self, this.config.muzzleOffset);
    const update = this.engagement.update(this.tracker, report, origin);
    const target = update.designatedTrackId === null ? undefined : this.tracker.find(update.designatedTrackId);

    let outcome: EngageOutcome | null = null;
    switch (update.mode) {
      case "no-target":
        this.onIdle?.(host, self);
        break;
      case "engaged":
      case "out-of-target-range":
        if (target) {
          outcome = this.engage(host, self, origin, target);
        }
        break;
      case "searching":
      case "out-of-radar-range":
        break;
    }

    host.setSensorAim(this.engagement.sweepFor(this.tracker, origin));

    return {
      role: "fighter",
      tick: report.tick,
      mode: update.mode,
      designatedTrackId: update.designatedTrackId,
      staleTargetCleared: update.staleTargetCleared,
      trackCount: this.tracker.size,
      turnPhase: outcome?.turn.phase ?? null,
      maneuver: outcome?.maneuver ?? null,
      aim: outcome?.aim ?? null,
      firedGun: outcome?.firedGun ?? false,
      launchedMissile: outcome?.launchedMissile ?? false,
      detonated: false,
    };
  }

  private engage(host: GuidanceHost, self: SelfKinematics, origin: Vec2, target: Track): EngageOutcome {
    const cfg = this.config;
    const maneuver = computeManeuver(self, origin, target, cfg);
    host.actuateLinear(maneuver.accel);

    const relativePosition = sub(target.position, origin);
    const relativeVelocity = sub(target.velocity, self.velocity);
    const aim = resolveAimPoint(relativePosition, relativeVelocity, cfg);
    const range = length(relativePosition);
    const rangeGate = { distance: range, maxRange: cfg.fireRange };

    // Inside close range the nose follows the lead point; farther out it points at the target itself.
    const turn = range < cfg.closeRange
      ? planTurn(self.heading, angleOf(aim.aimPoint), self.angularVelocity, cfg.closeTurn, rangeGate)
      : planTurn(self.heading, angleOf(relativePosition), self.angularVelocity, cfg.farTurn, rangeGate);
    if (turn.channel === "torque") {
      host.actuateTorque(turn.value);
    } else {
      host.actuateTurnRate(turn.value);
    }

    if (turn.fireEligible) {
      host.triggerWeapon(cfg.gunIndex);
    }
    if (cfg.launchMissiles) {
      host.triggerWeapon(cfg.missileIndex);
    }
    this.logger.debug("engaging", {
      track: target.id,
      range,
      phase: turn.phase,
      method: aim.method,
    });
    return { turn, aim, maneuver: maneuver.band, firedGun: turn.fireEligible, launchedMissile: cfg.launchMissiles };
  }
}
