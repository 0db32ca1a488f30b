/* door-navigator.ts - Square door crossings: align, approach, centre, exit */

import type { ApproachSide, DoorOrientation, Path, Point, TileCoord } from './types';
import type { NavTuning } from './tuning';
import type { DoorContextAnalyzer } from './door-context';

function tileKey(t: TileCoord): string {
  return `${t.x},${t.y}`;
}

/** Unit step from the door centre towards a side */
const SIDE_STEP: Readonly<Record<ApproachSide, Point>> = {
  north: { x: 0, y: -1 },
  south: { x: 0, y: 1 },
  west: { x: -1, y: 0 },
  east: { x: 1, y: 0 },
};

const OPPOSITE: Readonly<Record<ApproachSide, ApproachSide>> = {
  north: 'south',
  south: 'north',
  west: 'east',
  east: 'west',
};

export class DoorNavigator {
  constructor(
    private readonly doors: DoorContextAnalyzer,
    private readonly tuning: NavTuning,
  ) {}

  /** Door tiles touched by the segment a->b, in crossing order */
  doorsCrossed(a: Point, b: Point): TileCoord[] {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const distance = Math.sqrt(dx * dx + dy * dy);
    if (distance === 0) return [];

    const steps = Math.max(Math.floor(distance * this.tuning.doorSampleDensity), 3);
    const seen = new Set<string>();
    const found: TileCoord[] = [];
    for (let i = 0; i <= steps; i++) {
      const t = i / steps;
      const tile = { x: Math.floor(a.x + dx * t), y: Math.floor(a.y + dy * t) };
      if (!this.doors.isDoor(tile.x, tile.y) || seen.has(tileKey(tile))) continue;
      seen.add(tileKey(tile));
      found.push(tile);
    }
    return found;
  }

  approachSide(from: Point, doorCentre: Point, orientation: DoorOrientation): ApproachSide {
    if (orientation === 'horizontal') {
      return from.y - doorCentre.y < 0 ? 'north' : 'south';
    }
    return from.x - doorCentre.x < 0 ? 'west' : 'east';
  }

  /**
   * Fresh path with crossing waypoints after every segment start that
   * reaches a new door. Input points inside a handled door tile are
   * dropped, the final point excepted, and so are points between the
   * door centre and the exit waypoint of the crossing just made.
   */
  enhance(path: Path, radius: number): Path {
    if (path.length < 2) return path;

    const handled = new Set<string>();
    const out: Path = [path[0]];
    let exit: ExitBand | null = null;

    for (let i = 1; i < path.length; i++) {
      const a = path[i - 1];
      const b = path[i];

      for (const door of this.doorsCrossed(a, b)) {
        const key = tileKey(door);
        if (handled.has(key)) continue;
        handled.add(key);
        const crossing = this.crossing(a, door, radius);
        out.push(...crossing.waypoints);
        exit = crossing.exit;
      }

      const isLast = i === path.length - 1;
      if (isLast) {
        out.push(b);
        continue;
      }
      const bTile = { x: Math.floor(b.x), y: Math.floor(b.y) };
      if (handled.has(tileKey(bTile))) continue;
      if (exit !== null && insideExitBand(b, exit)) continue;
      exit = null;
      out.push(b);
    }
    return out;
  }

  /** Waypoints for crossing one door from `from`, plus the band they leave behind */
  private crossing(from: Point, door: TileCoord, radius: number): { waypoints: Point[]; exit: ExitBand } {
    const t = this.tuning;
    const orientation = this.doors.orientation(door.x, door.y);
    const centre = { x: door.x + 0.5, y: door.y + 0.5 };
    const side = this.approachSide(from, centre, orientation);
    const at = (s: ApproachSide, clearance: number): Point => ({
      x: centre.x + SIDE_STEP[s].x * clearance,
      y: centre.y + SIDE_STEP[s].y * clearance,
    });

    const waypoints: Point[] = [];

    const axisOffset = orientation === 'horizontal'
      ? Math.abs(from.x - centre.x)
      : Math.abs(from.y - centre.y);
    if (axisOffset > t.doorAlignmentTolerance) {
      waypoints.push(at(side, Math.max(t.alignmentClearance, radius + t.alignmentRadiusPad)));
    }

    const exitSide = OPPOSITE[side];
    const exitClearance = Math.max(t.exitClearance, radius + t.exitRadiusPad);
    waypoints.push(
      at(side, Math.max(t.approachClearance, radius + t.approachRadiusPad)),
      centre,
      at(exitSide, exitClearance),
    );
    return { waypoints, exit: { centre, step: SIDE_STEP[exitSide], clearance: exitClearance } };
  }
}

/** Stretch from a door centre out to its exit waypoint, up to one tile to either side */
interface ExitBand {
  centre: Point;
  step: Point;
  clearance: number;
}

function insideExitBand(p: Point, band: ExitBand): boolean {
  const dx = p.x - band.centre.x;
  const dy = p.y - band.centre.y;
  const along = dx * band.step.x + dy * band.step.y;
  const across = Math.abs(dx * band.step.y - dy * band.step.x);
  return along >= 0 && along < band.clearance && across < 1;
}
