/* path-validator.ts - Stepped movement simulation that truncates or patches a path */

import type { Path, Point } from './types';
import type { NavTuning } from './tuning';
import type { CollisionModel } from './collision';

export type StepResult =
  | { kind: 'clear' }
  | { kind: 'stuck' }                     // first sample already blocked
  | { kind: 'partial'; reached: Point };  // last clear sample before the obstruction

const ALTERNATIVE_DIRS: ReadonlyArray<readonly [number, number]> = [
  [1, 0], [-1, 0], [0, 1], [0, -1],
  [1, 1], [-1, 1], [1, -1], [-1, -1],
];

export class PathValidator {
  constructor(
    private readonly collision: CollisionModel,
    private readonly tuning: NavTuning,
  ) {}

  simulateStep(from: Point, to: Point, radius: number): StepResult {
    const dx = to.x - from.x;
    const dy = to.y - from.y;
    const distance = Math.sqrt(dx * dx + dy * dy);
    if (distance === 0) return { kind: 'clear' };

    const steps = Math.max(Math.floor(distance * this.tuning.validationSampleDensity), 3);
    for (let i = 1; i <= steps; i++) {
      const t = i / steps;
      if (!this.collision.enhancedBlocked({ x: from.x + dx * t, y: from.y + dy * t }, radius)) continue;
      if (i === 1) return { kind: 'stuck' };
      const clearT = (i - 1) / steps;
      return { kind: 'partial', reached: { x: from.x + dx * clearT, y: from.y + dy * clearT } };
    }
    return { kind: 'clear' };
  }

  /**
   * First offset around the target that is unblocked and keeps line of
   * sight from the current point and on to the following waypoint.
   */
  findAlternative(current: Point, target: Point, next: Point | undefined, radius: number): Point | null {
    const off = this.tuning.alternativeOffset;
    for (const [sx, sy] of ALTERNATIVE_DIRS) {
      const alt = { x: target.x + sx * off, y: target.y + sy * off };
      if (this.collision.blocked(alt, radius)) continue;
      if (!this.collision.hasLineOfSight(current, alt, radius)) continue;
      if (next !== undefined && !this.collision.hasLineOfSight(alt, next, radius)) continue;
      return alt;
    }
    return null;
  }

  /** Longest traversable version of the path; never extends it */
  validate(path: Path, radius: number): Path {
    if (path.length < 2) return path;

    const out: Path = [path[0]];
    for (let i = 1; i < path.length; i++) {
      const current = out[out.length - 1];
      const target = path[i];
      const step = this.simulateStep(current, target, radius);

      if (step.kind === 'clear') {
        out.push(target);
      } else if (step.kind === 'partial') {
        out.push(step.reached);
      } else {
        const alt = this.findAlternative(current, target, path[i + 1], radius);
        if (alt === null) break;
        out.push(alt);
      }
    }
    return out;
  }
}
