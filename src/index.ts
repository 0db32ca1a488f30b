/* index.ts - Public API of the navigation engine; the HTTP host lives in server.ts */

export { NavigationEngine, DEFAULT_RADIUS, pathLength } from './nav-engine';
export type { NavStages } from './nav-engine';
export { resolveTuning, DEFAULT_NAV_TUNING } from './tuning';
export type { NavTuning } from './tuning';
export { TileWorld, TILE_LEGEND } from './world';
export type { TileWorldOptions } from './world';
export { parseMap, loadMapFile } from './map-file';
export type { LoadedMap, MapFile } from './map-file';

export { WalkabilityGrid } from './walkability';
export { DoorContextAnalyzer } from './door-context';
export { CollisionModel } from './collision';
export { CoarsePathfinder } from './pathfinding';
export { CornerSmoother } from './corner-smoother';
export { DoorNavigator } from './door-navigator';
export { PathValidator } from './path-validator';
export type { StepResult } from './path-validator';

export type {
  Vec2,
  Point,
  TileCoord,
  Path,
  TileType,
  DoorOrientation,
  ApproachSide,
  DoorDescriptor,
  DoorContext,
  CollisionQuery,
  Corner,
  Collidable,
  Blocking,
  ObstacleKind,
  EntityKind,
  StaticObstacle,
  MobileEntity,
  NavWorld,
} from './types';
