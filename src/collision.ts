/* collision.ts - Point/radius collision queries over tiles, obstacles and entities */

import type { Collidable, NavWorld, Point } from './types';
import type { NavTuning } from './tuning';
import type { WalkabilityGrid } from './walkability';
import type { DoorContextAnalyzer } from './door-context';

function withinClearance(x: number, y: number, other: Collidable, clearance: number): boolean {
  const dx = x - other.position.x;
  const dy = y - other.position.y;
  return Math.sqrt(dx * dx + dy * dy) < clearance;
}

export class CollisionModel {
  constructor(
    private readonly world: NavWorld,
    private readonly grid: WalkabilityGrid,
    private readonly doors: DoorContextAnalyzer,
    private readonly tuning: NavTuning,
  ) {}

  /** True on the first violation found */
  blocked(position: Point, radius: number, excludeEntity?: string): boolean {
    const { x, y } = position;
    const t = this.tuning;

    const margin = radius + t.boundsMargin;
    if (x < margin || x >= this.grid.width - margin || y < margin || y >= this.grid.height - margin) {
      return true;
    }

    const ctx = this.doors.analyze(Math.floor(x), Math.floor(y));
    let effective: number;
    if (ctx.inDoorArea) {
      effective = radius * (ctx.isDoubleDoor ? t.doubleDoorRadiusFactor : t.doorRadiusFactor);
    } else {
      effective = radius * t.openRadiusFactor;
    }

    const probes: ReadonlyArray<Point> = [
      { x: x - effective, y: y - effective },
      { x: x + effective, y: y - effective },
      { x: x - effective, y: y + effective },
      { x: x + effective, y: y + effective },
      { x, y },
    ];
    for (const p of probes) {
      const tx = Math.floor(p.x);
      const ty = Math.floor(p.y);
      if (this.grid.inBounds(tx, ty) && this.grid.score(tx, ty) <= 0) return true;
    }

    // Doorways skip every object and entity check
    if (ctx.inDoorArea) return false;

    const objectClearance = radius + t.objectClearance;
    for (const o of this.world.obstacles()) {
      if (!o.blocksMovement || o.id === excludeEntity) continue;
      if (withinClearance(x, y, o, objectClearance)) return true;
    }

    const enemyClearance = radius + t.enemyClearance;
    for (const e of this.world.entities()) {
      if (e.id === excludeEntity) continue;
      const clearance = e.kind === 'enemy' ? enemyClearance : objectClearance;
      if (withinClearance(x, y, e, clearance)) return true;
    }

    return false;
  }

  /**
   * Obstacles on two opposing sides within reach of the body, even when
   * the centre itself is clear.
   */
  isSqueezed(position: Point, radius: number): boolean {
    const gap = radius + this.tuning.squeezeProbeGap;
    const probeRadius = radius * this.tuning.squeezeRadiusFactor;
    const { x, y } = position;

    const north = this.blocked({ x, y: y - gap }, probeRadius);
    const south = this.blocked({ x, y: y + gap }, probeRadius);
    if (north && south) return true;

    const east = this.blocked({ x: x + gap, y }, probeRadius);
    const west = this.blocked({ x: x - gap, y }, probeRadius);
    return east && west;
  }

  /** blocked() plus squeeze detection outside door areas */
  enhancedBlocked(position: Point, radius: number): boolean {
    if (this.blocked(position, radius)) return true;
    if (this.doors.analyze(Math.floor(position.x), Math.floor(position.y)).inDoorArea) return false;
    return this.isSqueezed(position, radius);
  }

  /** Interior samples only; endpoints are the caller's concern */
  hasLineOfSight(a: Point, b: Point, radius: number): boolean {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const distance = Math.sqrt(dx * dx + dy * dy);
    if (distance === 0) return true;

    const steps = Math.floor(distance * this.tuning.lineOfSightDensity);
    for (let i = 1; i < steps; i++) {
      const t = i / steps;
      const sample = { x: a.x + dx * t, y: a.y + dy * t };
      if (!this.grid.isWalkable(Math.floor(sample.x), Math.floor(sample.y))) return false;
      if (this.blocked(sample, radius)) return false;
    }
    return true;
  }
}
