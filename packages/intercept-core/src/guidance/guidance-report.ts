import type { TurnPhase } from "../control/angular-controller.ts";
import type { EngagementMode } from "../engagement/engagement-machine.ts";
import type { InterceptSolution } from "../shooting/intercept-solver.ts";
import type { GuidanceConfig } from "../config/guidance-config.ts";
import type { Logger } from "../logging/logger.ts";
import type { GuidanceHost, SelfKinematics, ShipKind } from "../types.ts";
import type { ManeuverBand } from "./maneuver.ts";

export interface GuidanceReport {
  role: ShipKind;
  tick: number;
  mode: EngagementMode;
  designatedTrackId: number | null;
  staleTargetCleared: boolean;
  trackCount: number;
  turnPhase: TurnPhase | null;
  maneuver: ManeuverBand | null;
  aim: InterceptSolution | null;
  firedGun: boolean;
  launchedMissile: boolean;
  detonated: boolean;
}

/** Host-side behavior for ticks without any target (wandering, patrols). */
export type IdleBehavior = (host: GuidanceHost, self: SelfKinematics) => void;

export interface GuidanceOptions {
  config: GuidanceConfig;
  logger?: Logger;
  onIdle?: IdleBehavior;
}
