export * from "./types.ts";
export * from "./errors.ts";

export * from "./math/vec2.ts";
export * from "./math/angle.ts";

export * from "./config/guidance-config.ts";
export * from "./logging/logger.ts";

export * from "./tracking/track-gate.ts";
export * from "./tracking/track.ts";
export * from "./tracking/tracker.ts";

export * from "./shooting/intercept-solver.ts";
export * from "./control/angular-controller.ts";

export * from "./engagement/radar-sweep.ts";
export * from "./engagement/engagement-machine.ts";

export * from "./guidance/geometry.ts";
export * from "./guidance/maneuver.ts";
export * from "./guidance/guidance-report.ts";
export * from "./guidance/fighter-guidance.ts";
export * from "./guidance/missile-guidance.ts";
export * from "./guidance/ship-role.ts";
