/* map-file.ts - Load and validate JSON map files into a TileWorld */

import fs from 'fs';
import { z } from 'zod';
import { TileWorld } from './world';
import type { MobileEntity, StaticObstacle } from './types';

const pointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const staticObstacleSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['object', 'chest']),
  position: pointSchema,
  blocksMovement: z.boolean().default(true),
});

export const mobileEntitySchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['npc', 'enemy']),
  position: pointSchema,
});

export const mapFileSchema = z.object({
  name: z.string().min(1),
  rows: z.array(z.string().min(1)).min(1),
  obstacles: z.array(staticObstacleSchema).default([]),
  entities: z.array(mobileEntitySchema).default([]),
});

export type MapFile = z.infer<typeof mapFileSchema>;

export interface LoadedMap {
  name: string;
  world: TileWorld;
}

export function worldFromMap(map: MapFile): LoadedMap {
  const obstacles: StaticObstacle[] = map.obstacles;
  const entities: MobileEntity[] = map.entities;
  return { name: map.name, world: TileWorld.fromRows(map.rows, { obstacles, entities }) };
}

/**
 * Parse map JSON text. Throws with the schema issues or the tile error
 * prefixed by `source`.
 */
export function parseMap(text: string, source: string): LoadedMap {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`${source}: not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const result = mapFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`${source}: ${problems}`);
  }

  try {
    return worldFromMap(result.data);
  } catch (err) {
    throw new Error(`${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function loadMapFile(filePath: string): LoadedMap {
  return parseMap(fs.readFileSync(filePath, 'utf8'), filePath);
}
