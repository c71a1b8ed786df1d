import {
  add,
  angleDiff,
  angleOf,
  distance,
  sub,
  type ScanPlot,
  type SensorAim,
  type Vec2,
} from "../../../packages/intercept-core/src/index.ts";
import { gaussian, type Rng } from "../lib/seeded-rng.ts";
import type { Body } from "./world-types.ts";

export interface RadarModel {
  noise: number;
  velocityNoise: number;
  noiseFloor: number;
}

export function inBeam(origin: Vec2, aim: SensorAim, point: Vec2): boolean {
  const range = distance(origin, point);
  if (range < aim.minRange || range > aim.maxRange) {
    return false;
  }
  return Math.abs(angleDiff(aim.heading, angleOf(sub(point, origin)))) <= aim.width / 2;
}

function jitter(v: Vec2, sigma: number, rng: Rng): Vec2 {
  if (sigma <= 0) {
    return v;
  }
  return add(v, { x: gaussian(rng) * sigma, y: gaussian(rng) * sigma });
}

/**
 * Returns a plot for the nearest hostile body inside the beam, if any. Only
 * one return is produced per scan.
 */
export function scanBeam(observer: Body, candidates: Iterable<Body>, model: RadarModel, rng: Rng, tick: number): ScanPlot | null {
  const aim = observer.sensorAim;
  if (!aim) {
    return null;
  }
  let best: Body | null = null;
  let bestRange = Number.POSITIVE_INFINITY;
  for (const body of candidates) {
    if (!body.alive || body.id === observer.id || body.team === observer.team) {
      continue;
    }
    if (!inBeam(observer.position, aim, body.position)) {
      continue;
    }
    const range = distance(observer.position, body.position);
    if (range < bestRange) {
      best = body;
      bestRange = range;
    }
  }
  if (!best) {
    return null;
  }
  // Two-way path loss, r^-4.
  const rssi = -40 * Math.log10(Math.max(bestRange, 1));
  return {
    position: jitter(best.position, model.noise, rng),
    velocity: jitter(best.velocity, model.velocityNoise, rng),
    snr: rssi - model.noiseFloor,
    rssi,
    tick,
    reportedClass: best.kind,
    friendly: false,
  };
}
