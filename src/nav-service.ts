/* nav-service.ts - Request-level navigation operations shared by REST and socket handlers */

import type { CollisionQuery, MobileEntity, Path, StaticObstacle } from './types';
import type { TileWorld } from './world';
import { NavigationEngine, pathLength } from './nav-engine';
import type { LineOfSightRequest, PathRequest } from './validation';

/** A path counts as reaching the goal when it ends within the body radius */
export interface PathResponse {
  ok: true;
  path: Path;
  length: number;
  reachedGoal: boolean;
}

export interface BlockedResponse {
  ok: true;
  blocked: boolean;
  enhanced: boolean;
}

export interface LineOfSightResponse {
  ok: true;
  clear: boolean;
}

export interface WorldSummary {
  name: string;
  width: number;
  height: number;
  rows: string[];
  obstacles: readonly StaticObstacle[];
  entities: readonly MobileEntity[];
}

export class NavService {
  readonly engine: NavigationEngine;

  constructor(
    readonly mapName: string,
    private readonly world: TileWorld,
    engine?: NavigationEngine,
  ) {
    this.engine = engine ?? new NavigationEngine(world);
  }

  findPath(req: PathRequest): PathResponse {
    const started = performance.now();
    const path = this.engine.findPath(req.start, req.goal, req.radius);
    const last = path[path.length - 1];
    const reachedGoal = last !== undefined && Math.hypot(last.x - req.goal.x, last.y - req.goal.y) <= req.radius;
    const elapsed = performance.now() - started;

    console.log(
      `[NAV] (${req.start.x}, ${req.start.y}) -> (${req.goal.x}, ${req.goal.y}) r=${req.radius}: ` +
      `${path.length} points${reachedGoal ? '' : ' (short of goal)'} in ${elapsed.toFixed(1)} ms`,
    );
    return { ok: true, path, length: pathLength(path), reachedGoal };
  }

  /** Both answers come from one walkability snapshot */
  blocked(req: CollisionQuery): BlockedResponse {
    const collision = this.engine.collisionModel();
    return {
      ok: true,
      blocked: collision.blocked(req.position, req.radius, req.excludeEntity),
      enhanced: collision.enhancedBlocked(req.position, req.radius),
    };
  }

  lineOfSight(req: LineOfSightRequest): LineOfSightResponse {
    return { ok: true, clear: this.engine.hasLineOfSight(req.from, req.to, req.radius) };
  }

  replaceEntities(entities: readonly MobileEntity[]): number {
    this.world.setEntities(entities);
    console.log(`[WORLD] ${entities.length} mobile entities on ${this.mapName}`);
    return entities.length;
  }

  summary(): WorldSummary {
    return {
      name: this.mapName,
      width: this.world.width,
      height: this.world.height,
      rows: this.world.toRows(),
      obstacles: this.world.obstacles(),
      entities: this.world.entities(),
    };
  }
}
