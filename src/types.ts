/* types.ts - Shared TypeScript types for tile navigation */

export interface Vec2 {
  x: number;
  y: number;
}

/** Continuous position in tile units */
export type Point = Vec2;

/** Integer tile coordinate; floor(point) gives the containing tile */
export type TileCoord = Vec2;

/** Ordered start-to-goal waypoints; empty means no path */
export type Path = Point[];

export type TileType =
  | 'grass' | 'dirt' | 'stone' | 'water' | 'wall' | 'window'
  | 'door' | 'brick' | 'sand' | 'snow' | 'forest' | 'swamp';

/**
 * Horizontal doors sit in an east-west wall run and are crossed north/south;
 * vertical doors sit in a north-south run and are crossed east/west.
 */
export type DoorOrientation = 'horizontal' | 'vertical';

export type ApproachSide = 'north' | 'south' | 'east' | 'west';

export interface DoorDescriptor {
  position: TileCoord;
  orientation: DoorOrientation;
  isDouble: boolean;
}

export interface DoorContext {
  inDoorArea: boolean;
  isDoubleDoor: boolean;
  orientation: DoorOrientation | null;
  distanceToNearestDoor: number;   // Infinity when no door is in scan range
}

export interface CollisionQuery {
  position: Point;
  radius: number;
  excludeEntity?: string;
}

export interface Corner {
  index: number;
  turnAngleDegrees: number;
  severity: number;   // 0-1
}

// ── Collidables ──────────────────────────────────────────────

export interface Collidable {
  readonly id: string;
  readonly position: Point;
}

export interface Blocking {
  readonly blocksMovement: boolean;
}

export type ObstacleKind = 'object' | 'chest';
export type EntityKind = 'npc' | 'enemy';

export interface StaticObstacle extends Collidable, Blocking {
  readonly kind: ObstacleKind;
}

export interface MobileEntity extends Collidable {
  readonly kind: EntityKind;
}

/**
 * Read-only view of the world the navigation engine consumes.
 * Must not change while a navigation call is in flight.
 */
export interface NavWorld {
  readonly width: number;
  readonly height: number;
  /** null outside the world */
  getTileType(x: number, y: number): TileType | null;
  /** 0..1, including static-object influence; 0 outside the world */
  getWalkability(x: number, y: number): number;
  isDoorTile(tile: TileType): boolean;
  isWallTile(tile: TileType): boolean;
  obstacles(): readonly StaticObstacle[];
  entities(): readonly MobileEntity[];
}
