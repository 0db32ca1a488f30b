/* door-context.ts - Door area classification around a tile */

import type { DoorContext, DoorDescriptor, DoorOrientation, NavWorld } from './types';
import type { NavTuning } from './tuning';

const NEIGHBOURS_4: ReadonlyArray<{ dx: number; dy: number }> = [
  { dx: -1, dy: 0 },
  { dx: 1, dy: 0 },
  { dx: 0, dy: -1 },
  { dx: 0, dy: 1 },
];

export class DoorContextAnalyzer {
  constructor(
    private readonly world: NavWorld,
    private readonly tuning: NavTuning,
  ) {}

  isDoor(x: number, y: number): boolean {
    const tile = this.world.getTileType(x, y);
    return tile !== null && this.world.isDoorTile(tile);
  }

  isWall(x: number, y: number): boolean {
    const tile = this.world.getTileType(x, y);
    return tile !== null && this.world.isWallTile(tile);
  }

  /**
   * Nearest door within the scan square decides the context.
   * Rows are scanned outer, columns inner; the first of equally near doors wins.
   */
  analyze(tileX: number, tileY: number): DoorContext {
    const r = this.tuning.doorScanRadius;
    let nearest: { x: number; y: number; distance: number } | null = null;

    for (let dy = -r; dy <= r; dy++) {
      for (let dx = -r; dx <= r; dx++) {
        if (!this.isDoor(tileX + dx, tileY + dy)) continue;
        const distance = Math.sqrt(dx * dx + dy * dy);
        if (nearest === null || distance < nearest.distance) {
          nearest = { x: tileX + dx, y: tileY + dy, distance };
        }
      }
    }

    if (nearest === null) {
      return { inDoorArea: false, isDoubleDoor: false, orientation: null, distanceToNearestDoor: Infinity };
    }
    if (nearest.distance > this.tuning.doorAreaDistance) {
      return { inDoorArea: false, isDoubleDoor: false, orientation: null, distanceToNearestDoor: nearest.distance };
    }
    return {
      inDoorArea: true,
      isDoubleDoor: this.isDoubleDoor(nearest.x, nearest.y),
      orientation: this.orientation(nearest.x, nearest.y),
      distanceToNearestDoor: nearest.distance,
    };
  }

  /** Any door among the four direct neighbours */
  isDoubleDoor(doorX: number, doorY: number): boolean {
    return NEIGHBOURS_4.some(({ dx, dy }) => this.isDoor(doorX + dx, doorY + dy));
  }

  /**
   * Walls east/west of the door form a horizontal run, walls north/south a
   * vertical one. Horizontal wins ties, including the no-wall case.
   */
  orientation(doorX: number, doorY: number): DoorOrientation {
    let horizontalRun = 0;
    let verticalRun = 0;
    if (this.isWall(doorX - 1, doorY)) horizontalRun++;
    if (this.isWall(doorX + 1, doorY)) horizontalRun++;
    if (this.isWall(doorX, doorY - 1)) verticalRun++;
    if (this.isWall(doorX, doorY + 1)) verticalRun++;
    return horizontalRun >= verticalRun ? 'horizontal' : 'vertical';
  }

  /** null when the tile is not a door */
  describe(tileX: number, tileY: number): DoorDescriptor | null {
    if (!this.isDoor(tileX, tileY)) return null;
    return {
      position: { x: tileX, y: tileY },
      orientation: this.orientation(tileX, tileY),
      isDouble: this.isDoubleDoor(tileX, tileY),
    };
  }
}
