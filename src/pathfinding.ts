/* pathfinding.ts - A* coarse search on the tile grid, refined to sub-tile points */

import type { NavWorld, Path, Point, TileCoord } from './types';
import type { NavTuning } from './tuning';
import type { WalkabilityGrid } from './walkability';
import type { CollisionModel } from './collision';

const SQRT2 = Math.SQRT2;

/** Directions: 8-way movement (dx, dy, cost) */
const DIRS: ReadonlyArray<{ dx: number; dy: number; cost: number }> = [
  { dx:  1, dy:  0, cost: 1 },
  { dx: -1, dy:  0, cost: 1 },
  { dx:  0, dy:  1, cost: 1 },
  { dx:  0, dy: -1, cost: 1 },
  { dx:  1, dy:  1, cost: SQRT2 },
  { dx: -1, dy:  1, cost: SQRT2 },
  { dx:  1, dy: -1, cost: SQRT2 },
  { dx: -1, dy: -1, cost: SQRT2 },
];

/** Candidate shifts from the tile centre, tried in order */
const SUB_TILE_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-0.3, 0], [0.3, 0], [0, -0.3], [0, 0.3],
  [-0.2, -0.2], [0.2, 0.2], [-0.2, 0.2], [0.2, -0.2],
];

/** Midpoint candidates for the short-range detour */
const MIDPOINT_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [0, 0], [0.3, 0], [-0.3, 0], [0, 0.3], [0, -0.3],
];

const OBSTACLE_PENALTY_WEIGHT = 0.5;
const OPEN_NEIGHBOUR_BONUS = 0.1;
const OPEN_NEIGHBOUR_THRESHOLD = 0.5;

/** Binary min-heap keyed by f-score for the A* open set */
class MinHeap {
  private readonly data: { key: number; f: number }[] = [];

  get size(): number { return this.data.length; }

  push(key: number, f: number): void {
    this.data.push({ key, f });
    this.bubbleUp(this.data.length - 1);
  }

  pop(): number | undefined {
    const top = this.data[0];
    const last = this.data.pop();
    if (last !== undefined && this.data.length > 0) {
      this.data[0] = last;
      this.sinkDown(0);
    }
    return top?.key;
  }

  private bubbleUp(i: number): void {
    const node = this.data[i];
    while (i > 0) {
      const parentIdx = (i - 1) >> 1;
      if (this.data[parentIdx].f <= node.f) break;
      this.data[i] = this.data[parentIdx];
      i = parentIdx;
    }
    this.data[i] = node;
  }

  private sinkDown(i: number): void {
    const length = this.data.length;
    const node = this.data[i];
    while (true) {
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      let smallest = i;

      if (left < length && this.data[left].f < this.data[smallest].f) {
        smallest = left;
      }
      if (right < length && this.data[right].f < this.data[smallest].f) {
        smallest = right;
      }
      if (smallest === i) break;
      this.data[i] = this.data[smallest];
      this.data[smallest] = node;
      i = smallest;
    }
  }
}

/** Octile distance: diagonal steps first, the remainder straight */
export function octile(ax: number, ay: number, bx: number, by: number): number {
  const dx = Math.abs(ax - bx);
  const dy = Math.abs(ay - by);
  return Math.max(dx, dy) + (SQRT2 - 1) * Math.min(dx, dy);
}

function tileOf(p: Point): TileCoord {
  return { x: Math.floor(p.x), y: Math.floor(p.y) };
}

function tileCentre(t: TileCoord): Point {
  return { x: t.x + 0.5, y: t.y + 0.5 };
}

export class CoarsePathfinder {
  constructor(
    private readonly world: NavWorld,
    private readonly grid: WalkabilityGrid,
    private readonly collision: CollisionModel,
    private readonly tuning: NavTuning,
  ) {}

  /**
   * Tile-resolution route from start to goal, excluding the start point.
   * Returns [] when the goal cannot be reached or the search cap is hit.
   */
  coarsePath(start: Point, goal: Point, radius: number): Path {
    const startTile = tileOf(start);
    if (!this.grid.inBounds(startTile.x, startTile.y)) return [];

    const rawGoalTile = tileOf(goal);
    const clampedGoal: TileCoord = {
      x: Math.max(0, Math.min(this.grid.width - 1, rawGoalTile.x)),
      y: Math.max(0, Math.min(this.grid.height - 1, rawGoalTile.y)),
    };
    const goalTile = this.nearestWalkable(clampedGoal.x, clampedGoal.y, radius);
    if (goalTile === null) return [];

    const remapped = goalTile.x !== rawGoalTile.x || goalTile.y !== rawGoalTile.y;
    const target = remapped ? tileCentre(goalTile) : goal;

    if (Math.abs(startTile.x - goalTile.x) <= 1 && Math.abs(startTile.y - goalTile.y) <= 1) {
      return this.shortRangePath(start, target, radius);
    }

    const tiles = this.search(startTile, goalTile, radius);
    if (tiles === null) return [];

    const path: Path = tiles.slice(0, -1).map(t => this.subTilePosition(t.x, t.y, radius));
    if (!remapped && !this.collision.blocked(goal, radius)) {
      path.push({ x: goal.x, y: goal.y });
    } else {
      path.push(this.subTilePosition(goalTile.x, goalTile.y, radius));
    }
    return path;
  }

  /** In bounds, walkable, and no blocking obstacle crowding the tile centre */
  isSearchWalkable(tileX: number, tileY: number, radius: number): boolean {
    if (!this.grid.isWalkable(tileX, tileY)) return false;
    const cx = tileX + 0.5;
    const cy = tileY + 0.5;
    const clearance = radius + this.tuning.searchObstacleClearance;
    for (const o of this.world.obstacles()) {
      if (!o.blocksMovement) continue;
      if (Math.hypot(cx - o.position.x, cy - o.position.y) < clearance) return false;
    }
    return true;
  }

  /**
   * The tile itself when search-walkable, else the first walkable tile on
   * square rings of growing radius. null when the rings are exhausted.
   */
  nearestWalkable(tileX: number, tileY: number, radius: number): TileCoord | null {
    if (this.isSearchWalkable(tileX, tileY, radius)) return { x: tileX, y: tileY };

    for (let ring = 1; ring <= this.tuning.goalSearchRadius; ring++) {
      for (let dx = -ring; dx <= ring; dx++) {
        for (let dy = -ring; dy <= ring; dy++) {
          if (Math.abs(dx) !== ring && Math.abs(dy) !== ring) continue;
          if (this.isSearchWalkable(tileX + dx, tileY + dy, radius)) {
            return { x: tileX + dx, y: tileY + dy };
          }
        }
      }
    }
    return null;
  }

  /**
   * Best unblocked point inside the tile: centre first, then fixed offsets.
   * Only a strictly better score replaces the current pick.
   */
  subTilePosition(tileX: number, tileY: number, radius: number): Point {
    const centre = tileCentre({ x: tileX, y: tileY });
    let best: Point | null = null;
    let bestScore = -Infinity;

    const candidates: Point[] = [centre, ...SUB_TILE_OFFSETS.map(([dx, dy]) => ({ x: centre.x + dx, y: centre.y + dy }))];
    for (const c of candidates) {
      if (c.x < tileX || c.x >= tileX + 1 || c.y < tileY || c.y >= tileY + 1) continue;
      if (this.collision.blocked(c, radius)) continue;
      const score = this.positionQuality(c);
      if (best === null || score > bestScore) {
        best = c;
        bestScore = score;
      }
    }
    return best ?? centre;
  }

  /** Higher is better: away from obstacles, surrounded by open tiles */
  positionQuality(p: Point): number {
    let score = 1;
    const range = this.tuning.subTileObstacleRange;
    for (const o of this.world.obstacles()) {
      if (!o.blocksMovement) continue;
      const d = Math.hypot(p.x - o.position.x, p.y - o.position.y);
      if (d < range) score -= Math.max(0, range - d) * OBSTACLE_PENALTY_WEIGHT;
    }

    const tx = Math.floor(p.x);
    const ty = Math.floor(p.y);
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        if (this.grid.score(tx + dx, ty + dy) > OPEN_NEIGHBOUR_THRESHOLD) score += OPEN_NEIGHBOUR_BONUS;
      }
    }
    return Math.max(0, score);
  }

  private shortRangePath(start: Point, target: Point, radius: number): Path {
    if (this.collision.hasLineOfSight(start, target, radius)) {
      return [{ x: target.x, y: target.y }];
    }

    const midX = (start.x + target.x) / 2;
    const midY = (start.y + target.y) / 2;
    for (const [dx, dy] of MIDPOINT_OFFSETS) {
      const mid = { x: midX + dx, y: midY + dy };
      if (this.collision.blocked(mid, radius)) continue;
      if (this.collision.hasLineOfSight(start, mid, radius) && this.collision.hasLineOfSight(mid, target, radius)) {
        return [mid, { x: target.x, y: target.y }];
      }
    }

    return [tileCentre(tileOf(target))];
  }

  /** Cost of entering (nx, ny) with the given base step cost */
  private stepCost(nx: number, ny: number, baseCost: number): number {
    const t = this.tuning;
    const walkability = this.grid.score(nx, ny);
    let cost = baseCost * (1 + t.walkabilityPenalty * (1 - walkability));

    const tile = this.world.getTileType(nx, ny);
    if (tile !== null && this.world.isDoorTile(tile)) {
      cost *= t.doorCostFactor;
    } else if (walkability > t.openGroundThreshold) {
      cost *= t.openGroundCostFactor;
    }
    return cost;
  }

  /** Tiles after the start up to and including the goal, or null */
  private search(start: TileCoord, goal: TileCoord, radius: number): TileCoord[] | null {
    const width = this.grid.width;
    const height = this.grid.height;
    const totalCells = width * height;
    const toIndex = (cx: number, cy: number): number => cy * width + cx;

    // 0 = unknown, 1 = walkable, 2 = blocked
    const walkableCache = new Uint8Array(totalCells);
    const walkable = (cx: number, cy: number): boolean => {
      if (cx < 0 || cx >= width || cy < 0 || cy >= height) return false;
      const idx = toIndex(cx, cy);
      if (walkableCache[idx] === 0) {
        walkableCache[idx] = this.isSearchWalkable(cx, cy, radius) ? 1 : 2;
      }
      return walkableCache[idx] === 1;
    };

    const gScore = new Float64Array(totalCells);
    gScore.fill(Infinity);
    const cameFrom = new Int32Array(totalCells);
    cameFrom.fill(-1);
    const closed = new Uint8Array(totalCells);

    const startIdx = toIndex(start.x, start.y);
    const goalIdx = toIndex(goal.x, goal.y);

    gScore[startIdx] = 0;
    const heap = new MinHeap();
    heap.push(startIdx, octile(start.x, start.y, goal.x, goal.y));

    let found = false;
    let pops = 0;

    while (heap.size > 0) {
      if (++pops > this.tuning.maxExpansions) break;
      const currentIdx = heap.pop();
      if (currentIdx === undefined) break;
      if (currentIdx === goalIdx) {
        found = true;
        break;
      }
      if (closed[currentIdx]) continue;
      closed[currentIdx] = 1;

      const curX = currentIdx % width;
      const curY = (currentIdx - curX) / width;
      const curG = gScore[currentIdx];

      for (const dir of DIRS) {
        const nx = curX + dir.dx;
        const ny = curY + dir.dy;
        if (!walkable(nx, ny)) continue;

        const nIdx = toIndex(nx, ny);
        if (closed[nIdx]) continue;

        // Diagonal moves may not clip a blocked orthogonal neighbour
        if (dir.dx !== 0 && dir.dy !== 0) {
          if (!walkable(curX + dir.dx, curY) || !walkable(curX, curY + dir.dy)) continue;
        }

        const tentativeG = curG + this.stepCost(nx, ny, dir.cost);
        if (tentativeG < gScore[nIdx]) {
          gScore[nIdx] = tentativeG;
          cameFrom[nIdx] = currentIdx;
          heap.push(nIdx, tentativeG + octile(nx, ny, goal.x, goal.y));
        }
      }
    }

    if (!found) return null;

    const tiles: TileCoord[] = [];
    let idx = goalIdx;
    while (idx !== -1 && idx !== startIdx) {
      const px = idx % width;
      tiles.push({ x: px, y: (idx - px) / width });
      idx = cameFrom[idx];
    }
    tiles.reverse();
    return tiles;
  }
}
