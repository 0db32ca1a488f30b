/* corner-smoother.ts - Replace sharp path turns with collision-checked Bézier arcs */

import type { Corner, Path, Point } from './types';
import type { NavTuning } from './tuning';
import type { CollisionModel } from './collision';

/** Signed turn at b between a->b and b->c, in degrees (-180, 180] */
export function turnAngle(a: Point, b: Point, c: Point): number {
  const v1x = b.x - a.x;
  const v1y = b.y - a.y;
  const v2x = c.x - b.x;
  const v2y = c.y - b.y;
  const dot = v1x * v2x + v1y * v2y;
  const cross = v1x * v2y - v1y * v2x;
  return (Math.atan2(cross, dot) * 180) / Math.PI;
}

/** Quadratic Bézier: B(t) = (1-t)²·p0 + 2(1-t)t·p1 + t²·p2 */
function quadratic(p0: Point, p1: Point, p2: Point, t: number): Point {
  const u = 1 - t;
  return {
    x: u * u * p0.x + 2 * u * t * p1.x + t * t * p2.x,
    y: u * u * p0.y + 2 * u * t * p1.y + t * t * p2.y,
  };
}

export class CornerSmoother {
  constructor(
    private readonly collision: CollisionModel,
    private readonly tuning: NavTuning,
  ) {}

  detectCorners(path: Path): Corner[] {
    const corners: Corner[] = [];
    for (let i = 1; i < path.length - 1; i++) {
      const angle = turnAngle(path[i - 1], path[i], path[i + 1]);
      if (Math.abs(angle) > this.tuning.cornerThresholdDegrees) {
        corners.push({ index: i, turnAngleDegrees: angle, severity: Math.min(Math.abs(angle) / 90, 1) });
      }
    }
    return corners;
  }

  /**
   * Each corner point becomes a curve; neighbours (including the endpoints)
   * are kept. A curve with any blocked sample collapses back to the corner.
   */
  smooth(path: Path, radius: number): Path {
    if (path.length < 3) return path;

    const corners = this.detectCorners(path);
    if (corners.length === 0) return path;

    const curves = new Map<number, Point[]>();
    for (const corner of corners) {
      curves.set(corner.index, this.curveAt(path, corner, radius));
    }

    const out: Path = [];
    path.forEach((point, i) => {
      const curve = curves.get(i);
      if (curve === undefined) {
        out.push(point);
      } else {
        out.push(...curve);
      }
    });
    return out;
  }

  /** Curve samples replacing the corner point, or just the corner on failure */
  curveAt(path: Path, corner: Corner, radius: number): Point[] {
    const t = this.tuning;
    const p0 = path[corner.index - 1];
    const p1 = path[corner.index];
    const p2 = path[corner.index + 1];

    const d1 = Math.hypot(p1.x - p0.x, p1.y - p0.y);
    const d2 = Math.hypot(p2.x - p1.x, p2.y - p1.y);
    if (d1 === 0 || d2 === 0) return [p1];

    const offset = Math.min(t.curveBaseOffset + corner.severity * t.curveSeverityOffset, radius * t.curveRadiusCap);

    const c1 = { x: p1.x - ((p1.x - p0.x) / d1) * offset, y: p1.y - ((p1.y - p0.y) / d1) * offset };
    const c2 = { x: p1.x + ((p2.x - p1.x) / d2) * offset, y: p1.y + ((p2.y - p1.y) / d2) * offset };

    const intervals = Math.max(3, Math.floor(offset * t.curveSampleDensity));
    const samples: Point[] = [];
    for (let i = 0; i <= intervals; i++) {
      const sample = quadratic(c1, p1, c2, i / intervals);
      if (this.collision.blocked(sample, radius)) return [p1];
      samples.push(sample);
    }
    return samples;
  }
}
