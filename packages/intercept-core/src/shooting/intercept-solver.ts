import type { GuidanceConfig } from "../config/guidance-config.ts";
import { add, dot, length, scale, type Vec2 } from "../math/vec2.ts";

export type InterceptMethod = "quadratic" | "quadratic-per-tick" | "iterative" | "linear-lead";

export interface InterceptSolution {
  /** Aim point relative to the shooter. */
  aimPoint: Vec2;
  /** Time of flight in seconds, or in ticks for the per-tick variants. */
  time: number;
  method: InterceptMethod;
}

const LINEAR_EPSILON = 1e-9;

/**
 * Earliest positive root of a·t² + b·t + c = 0, or null when the discriminant
 * is negative or no root is positive.
 */
export function smallestPositiveRoot(a: number, b: number, c: number): number | null {
  if (Math.abs(a) < LINEAR_EPSILON) {
    if (Math.abs(b) < LINEAR_EPSILON) {
      return null;
    }
    const t = -c / b;
    return t > 0 ? t : null;
  }
  const discriminant = b * b - 4 * a * c;
  if (discriminant < 0) {
    return null;
  }
  const s = Math.sqrt(discriminant);
  const x1 = (-b - s) / (2 * a);
  const x2 = (-b + s) / (2 * a);
  if (x1 > 0 && x2 > 0) {
    return Math.min(x1, x2);
  }
  if (x1 > 0) {
    return x1;
  }
  if (x2 > 0) {
    return x2;
  }
  return null;
}

/** Solves |p + t·v| = s·t for the first-hit time. */
export function solveInterceptTime(relativePosition: Vec2, relativeVelocity: Vec2, projectileSpeed: number): number | null {
  const a = dot(relativeVelocity, relativeVelocity) - projectileSpeed * projectileSpeed;
  const b = 2 * dot(relativePosition, relativeVelocity);
  const c = dot(relativePosition, relativePosition);
  return smallestPositiveRoot(a, b, c);
}

export function solveIntercept(relativePosition: Vec2, relativeVelocity: Vec2, projectileSpeed: number): InterceptSolution | null {
  const t = solveInterceptTime(relativePosition, relativeVelocity, projectileSpeed);
  if (t === null) {
    return null;
  }
  return { aimPoint: add(relativePosition, scale(relativeVelocity, t)), time: t, method: "quadratic" };
}

/** Projectile displacement per tick, rounded up to whole metres. */
export function projectileStepPerTick(projectileSpeed: number, ticksPerSecond: number): number {
  return Math.ceil(projectileSpeed / ticksPerSecond);
}

export function solveInterceptPerTick(
  relativePosition: Vec2,
  relativeVelocity: Vec2,
  projectileSpeed: number,
  ticksPerSecond: number,
): InterceptSolution | null {
  const velocityPerTick = scale(relativeVelocity, 1 / ticksPerSecond);
  const step = projectileStepPerTick(projectileSpeed, ticksPerSecond);
  const ticks = solveInterceptTime(relativePosition, velocityPerTick, step);
  if (ticks === null) {
    return null;
  }
  return { aimPoint: add(relativePosition, scale(velocityPerTick, ticks)), time: ticks, method: "quadratic-per-tick" };
}

/** First-order lead: p + v·|p|/s. */
export function linearLead(relativePosition: Vec2, relativeVelocity: Vec2, projectileSpeed: number): Vec2 {
  return add(relativePosition, scale(relativeVelocity, length(relativePosition) / projectileSpeed));
}

export function linearLeadPerTick(
  relativePosition: Vec2,
  relativeVelocity: Vec2,
  projectileSpeed: number,
  ticksPerSecond: number,
): Vec2 {
  const velocityPerTick = scale(relativeVelocity, 1 / ticksPerSecond);
  const step = projectileStepPerTick(projectileSpeed, ticksPerSecond);
  return add(relativePosition, scale(velocityPerTick, length(relativePosition) / step));
}

/**
 * Fixed-point refinement t ← |p + t·v| / s from t = 0. Converges when the
 * target is slower than the projectile.
 */
export function iterateInterceptTime(
  relativePosition: Vec2,
  relativeVelocity: Vec2,
  projectileSpeed: number,
  maxIterations = 10,
): number {
  let t = 0;
  for (let i = 0; i < maxIterations; i += 1) {
    const previous = t;
    t = length(add(relativePosition, scale(relativeVelocity, t))) / projectileSpeed;
    if (Math.abs(t - previous) < Number.EPSILON) {
      break;
    }
  }
  return t;
}

export function iterateIntercept(
  relativePosition: Vec2,
  relativeVelocity: Vec2,
  projectileSpeed: number,
  maxIterations = 10,
): InterceptSolution {
  const t = iterateInterceptTime(relativePosition, relativeVelocity, projectileSpeed, maxIterations);
  return { aimPoint: add(relativePosition, scale(relativeVelocity, t)), time: t, method: "iterative" };
}

/**
 * Aim point for the configured gun: the closed-form solution when one exists,
 * otherwise the per-tick linear lead.
 */
export function resolveAimPoint(
  relativePosition: Vec2,
  relativeVelocity: Vec2,
  config: Pick<GuidanceConfig, "projectileSpeed" | "ticksPerSecond">,
): InterceptSolution {
  const solved = solveIntercept(relativePosition, relativeVelocity, config.projectileSpeed);
  if (solved) {
    return solved;
  }
  const step = projectileStepPerTick(config.projectileSpeed, config.ticksPerSecond);
  return {
    aimPoint: linearLeadPerTick(relativePosition, relativeVelocity, config.projectileSpeed, config.ticksPerSecond),
    time: length(relativePosition) / step,
    method: "linear-lead",
  };
}
