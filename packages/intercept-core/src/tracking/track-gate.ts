import type { Vec2 } from "../math/vec2.ts";

/**
 * Square association window around a track's resolved position. `radius` is
 * the side length of the square; edges sit at `center ± radius / 2`.
 */
export class TrackGate {
  private centerPoint: Vec2;
  private side: number;

  constructor(center: Vec2, radius: number) {
    this.centerPoint = center;
    this.side = TrackGate.checkedRadius(radius);
  }

  public get center(): Vec2 {
    return this.centerPoint;
  }

  public get radius(): number {
    return this.side;
  }

  public updateCenter(center: Vec2): void {
    this.centerPoint = center;
  }

  public updateRadius(radius: number): void {
    this.side = TrackGate.checkedRadius(radius);
  }

  /** Strict interior test: a point lying on any edge is outside. */
  public pointInGate(point: Vec2): boolean {
    const half = this.side / 2;
    const right = this.centerPoint.x + half;
    const left = this.centerPoint.x - half;
    const top = this.centerPoint.y + half;
    const bottom = this.centerPoint.y - half;
    if (point.x >= right || point.x <= left) {
      return false;
    }
    if (point.y >= top || point.y <= bottom) {
      return false;
    }
    return true;
  }

  private static checkedRadius(radius: number): number {
    if (!Number.isFinite(radius) || radius <= 0) {
      throw new RangeError(`gate radius must be a positive finite number (got ${radius})`);
    }
    return radius;
  }
}
