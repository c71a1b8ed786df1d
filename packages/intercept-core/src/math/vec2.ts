export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export const ZERO: Vec2 = { x: 0, y: 0 };

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, k: number): Vec2 {
  return { x: v.x * k, y: v.y * k };
}

export function div(v: Vec2, k: number): Vec2 {
  return { x: v.x / k, y: v.y / k };
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

export function length(v: Vec2): number {
  return Math.hypot(v.x, v.y);
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Heading of the vector in radians, measured from +x. */
export function angleOf(v: Vec2): number {
  return Math.atan2(v.y, v.x);
}

export function normalize(v: Vec2): Vec2 {
  const len = length(v);
  return len > 0 ? { x: v.x / len, y: v.y / len } : ZERO;
}

export function fromAngle(angleRad: number, magnitude = 1): Vec2 {
  return { x: Math.cos(angleRad) * magnitude, y: Math.sin(angleRad) * magnitude };
}

export function average(points: ReadonlyArray<Vec2>): Vec2 {
  if (points.length === 0) {
    return ZERO;
  }
  let x = 0;
  let y = 0;
  for (const p of points) {
    x += p.x;
    y += p.y;
  }
  return { x: x / points.length, y: y / points.length };
}
