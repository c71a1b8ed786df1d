const TAU = Math.PI * 2;

/** Wraps an angle into [-π, π]. */
export function wrapAngle(angleRad: number): number {
  let c = angleRad % TAU;
  if (c > Math.PI) {
    c -= TAU;
  } else if (c < -Math.PI) {
    c += TAU;
  }
  return c;
}

/** Signed shortest rotation that takes `from` onto `to`. */
export function angleDiff(from: number, to: number): number {
  return wrapAngle(to - from);
}
