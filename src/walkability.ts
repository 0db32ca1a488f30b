/* walkability.ts - Per-call snapshot of tile walkability scores */

import type { NavWorld } from './types';

/**
 * Immutable copy of the world's walkability, taken once per navigation
 * call so every stage reads the same scores.
 */
export class WalkabilityGrid {
  private constructor(
    readonly width: number,
    readonly height: number,
    private readonly scores: Float64Array,
  ) {}

  static fromWorld(world: NavWorld): WalkabilityGrid {
    const scores = new Float64Array(world.width * world.height);
    for (let y = 0; y < world.height; y++) {
      for (let x = 0; x < world.width; x++) {
        const s = world.getWalkability(x, y);
        scores[y * world.width + x] = Math.min(1, Math.max(0, s));
      }
    }
    return new WalkabilityGrid(world.width, world.height, scores);
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /** 0 outside the grid */
  score(x: number, y: number): number {
    if (!this.inBounds(x, y)) return 0;
    return this.scores[y * this.width + x];
  }

  isWalkable(x: number, y: number): boolean {
    return this.score(x, y) > 0;
  }
}
