/**
 * world.ts - Tile map world backing the navigation engine
 *
 * Holds the tile grid, static obstacles and mobile entities, and
 * precomputes per-tile walkability (terrain + obstacle influence)
 * whenever the static layout changes.
 */

import type { MobileEntity, NavWorld, StaticObstacle, TileType } from './types';

export const TILE_LEGEND: Readonly<Record<string, TileType>> = {
  '.': 'grass',
  ',': 'dirt',
  ':': 'stone',
  '~': 'water',
  '#': 'wall',
  'W': 'window',
  'D': 'door',
  '=': 'brick',
  's': 'sand',
  '*': 'snow',
  'f': 'forest',
  '%': 'swamp',
};

const WALKABLE_TILES: ReadonlySet<TileType> = new Set<TileType>([
  'grass', 'dirt', 'stone', 'door', 'brick', 'sand', 'snow', 'forest', 'swamp',
]);

const WALL_TILES: ReadonlySet<TileType> = new Set<TileType>(['wall', 'window']);

const INFLUENCE_RANGE = 1.5;   // tiles
const BLOCKED_INFLUENCE = 0.8;
const RESTRICTED_INFLUENCE = 0.4;
const RESTRICTED_SCORE = 0.3;

export function isWalkableTile(tile: TileType): boolean {
  return WALKABLE_TILES.has(tile);
}

/** Strongest influence of any blocking obstacle on the tile centre, 0..1 */
export function obstacleInfluence(x: number, y: number, obstacles: readonly StaticObstacle[]): number {
  const cx = x + 0.5;
  const cy = y + 0.5;
  let max = 0;
  for (const o of obstacles) {
    if (!o.blocksMovement) continue;
    const dist = Math.hypot(cx - o.position.x, cy - o.position.y);
    if (dist < INFLUENCE_RANGE) {
      max = Math.max(max, 1 - dist / INFLUENCE_RANGE);
    }
  }
  return max;
}

/** Walkability score for one tile: 0 blocked, 0.3 restricted, 1 open */
export function tileWalkability(tile: TileType, influence: number): number {
  if (!isWalkableTile(tile)) return 0;
  if (influence > BLOCKED_INFLUENCE) return 0;
  if (influence > RESTRICTED_INFLUENCE) return RESTRICTED_SCORE;
  return 1;
}

export interface TileWorldOptions {
  obstacles?: readonly StaticObstacle[];
  entities?: readonly MobileEntity[];
}

export class TileWorld implements NavWorld {
  readonly width: number;
  readonly height: number;
  private readonly tiles: TileType[];
  private readonly walkability: Float64Array;
  private staticObstacles: readonly StaticObstacle[];
  private mobileEntities: readonly MobileEntity[];

  constructor(width: number, height: number, tiles: TileType[], options: TileWorldOptions = {}) {
    if (tiles.length !== width * height) {
      throw new Error(`Tile count ${tiles.length} does not match ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.tiles = tiles;
    this.walkability = new Float64Array(width * height);
    this.staticObstacles = options.obstacles ?? [];
    this.mobileEntities = options.entities ?? [];
    this.rebuildWalkability();
  }

  /**
   * Build a world from ASCII rows (see TILE_LEGEND). Row 0 is y = 0.
   * Throws on ragged rows or unknown characters.
   */
  static fromRows(rows: readonly string[], options: TileWorldOptions = {}): TileWorld {
    if (rows.length === 0) throw new Error('Map has no rows');
    const width = rows[0].length;
    const tiles: TileType[] = [];
    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new Error(`Row ${y} has length ${row.length}, expected ${width}`);
      }
      for (const ch of row) {
        const tile = TILE_LEGEND[ch];
        if (tile === undefined) {
          throw new Error(`Unknown tile character '${ch}' in row ${y}`);
        }
        tiles.push(tile);
      }
    });
    return new TileWorld(width, rows.length, tiles, options);
  }

  private inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  getTileType(x: number, y: number): TileType | null {
    if (!this.inBounds(x, y)) return null;
    return this.tiles[y * this.width + x];
  }

  getWalkability(x: number, y: number): number {
    if (!this.inBounds(x, y)) return 0;
    return this.walkability[y * this.width + x];
  }

  isDoorTile(tile: TileType): boolean {
    return tile === 'door';
  }

  isWallTile(tile: TileType): boolean {
    return WALL_TILES.has(tile);
  }

  obstacles(): readonly StaticObstacle[] {
    return this.staticObstacles;
  }

  entities(): readonly MobileEntity[] {
    return this.mobileEntities;
  }

  /** Replace the static layout; walkability is recomputed */
  setObstacles(obstacles: readonly StaticObstacle[]): void {
    this.staticObstacles = obstacles;
    this.rebuildWalkability();
  }

  /** Mobile entities never feed walkability, so no rebuild */
  setEntities(entities: readonly MobileEntity[]): void {
    this.mobileEntities = entities;
  }

  /** ASCII rows, the inverse of fromRows */
  toRows(): string[] {
    const glyphs = new Map<TileType, string>();
    for (const [ch, tile] of Object.entries(TILE_LEGEND)) glyphs.set(tile, ch);
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let row = '';
      for (let x = 0; x < this.width; x++) {
        row += glyphs.get(this.tiles[y * this.width + x]) ?? '?';
      }
      rows.push(row);
    }
    return rows;
  }

  private rebuildWalkability(): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const idx = y * this.width + x;
        this.walkability[idx] = tileWalkability(this.tiles[idx], obstacleInfluence(x, y, this.staticObstacles));
      }
    }
  }
}
