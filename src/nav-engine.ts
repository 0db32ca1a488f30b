/**
 * nav-engine.ts - Entry point for path and collision queries
 *
 * Every call snapshots walkability and builds its stages fresh, so the
 * engine holds no state between calls. The world must not change while
 * a call is running.
 */

import type { NavWorld, Path, Point } from './types';
import { resolveTuning, type NavTuning } from './tuning';
import { WalkabilityGrid } from './walkability';
import { DoorContextAnalyzer } from './door-context';
import { CollisionModel } from './collision';
import { CoarsePathfinder } from './pathfinding';
import { CornerSmoother } from './corner-smoother';
import { DoorNavigator } from './door-navigator';
import { PathValidator } from './path-validator';

export const DEFAULT_RADIUS = 0.4;

/** Read-only services and stages for a single call */
export interface NavStages {
  grid: WalkabilityGrid;
  doors: DoorContextAnalyzer;
  collision: CollisionModel;
  coarse: CoarsePathfinder;
  smoother: CornerSmoother;
  doorNavigator: DoorNavigator;
  validator: PathValidator;
}

export class NavigationEngine {
  readonly tuning: NavTuning;

  /** Throws ZodError for invalid tuning overrides */
  constructor(
    private readonly world: NavWorld,
    tuning: Partial<NavTuning> = {},
  ) {
    this.tuning = resolveTuning(tuning);
  }

  /** Walkability snapshot with just the services point queries need */
  collisionModel(): CollisionModel {
    return this.queryServices().collision;
  }

  stages(): NavStages {
    const { grid, doors, collision } = this.queryServices();
    return {
      grid,
      doors,
      collision,
      coarse: new CoarsePathfinder(this.world, grid, collision, this.tuning),
      smoother: new CornerSmoother(collision, this.tuning),
      doorNavigator: new DoorNavigator(doors, this.tuning),
      validator: new PathValidator(collision, this.tuning),
    };
  }

  /**
   * Start-first path to the goal (or the nearest reachable stand-in).
   * Empty when unreachable; may stop short when validation truncates it.
   */
  findPath(start: Point, goal: Point, radius = DEFAULT_RADIUS): Path {
    const s = this.stages();
    const coarse = s.coarse.coarsePath(start, goal, radius);
    if (coarse.length === 0) return [];

    const full: Path = [{ x: start.x, y: start.y }, ...coarse];
    const smoothed = s.smoother.smooth(full, radius);
    const withDoors = s.doorNavigator.enhance(smoothed, radius);
    return s.validator.validate(withDoors, radius);
  }

  hasLineOfSight(a: Point, b: Point, radius = DEFAULT_RADIUS): boolean {
    return this.collisionModel().hasLineOfSight(a, b, radius);
  }

  blocked(position: Point, radius = DEFAULT_RADIUS, excludeEntity?: string): boolean {
    return this.collisionModel().blocked(position, radius, excludeEntity);
  }

  enhancedBlocked(position: Point, radius = DEFAULT_RADIUS): boolean {
    return this.collisionModel().enhancedBlocked(position, radius);
  }

  private queryServices(): Pick<NavStages, 'grid' | 'doors' | 'collision'> {
    const grid = WalkabilityGrid.fromWorld(this.world);
    const doors = new DoorContextAnalyzer(this.world, this.tuning);
    return { grid, doors, collision: new CollisionModel(this.world, grid, doors, this.tuning) };
  }
}

/** Sum of segment lengths */
export function pathLength(path: Path): number {
  let total = 0;
  for (let i = 1; i < path.length; i++) {
    total += Math.hypot(path[i].x - path[i - 1].x, path[i].y - path[i - 1].y);
  }
  return total;
}
