import { describe, it, expect } from 'vitest';
import { PathValidator } from '../src/path-validator';
import { TileWorld, type TileWorldOptions } from '../src/world';
import { WalkabilityGrid } from '../src/walkability';
import { DoorContextAnalyzer } from '../src/door-context';
import { CollisionModel } from '../src/collision';
import { DEFAULT_NAV_TUNING } from '../src/tuning';
import type { Path } from '../src/types';

/** 10x10 with a solid wall column at x = 5 */
const wallColumnRows = Array.from({ length: 10 }, () => '.....#....');

function validatorFor(rows: string[], options: TileWorldOptions = {}): PathValidator {
  const world = TileWorld.fromRows(rows, options);
  const grid = WalkabilityGrid.fromWorld(world);
  const collision = new CollisionModel(world, grid, new DoorContextAnalyzer(world, DEFAULT_NAV_TUNING), DEFAULT_NAV_TUNING);
  return new PathValidator(collision, DEFAULT_NAV_TUNING);
}

describe('PathValidator', () => {
  describe('simulateStep', () => {
    it('is clear across open ground', () => {
      const validator = validatorFor(Array.from({ length: 10 }, () => '..........'));
      expect(validator.simulateStep({ x: 2.5, y: 2.5 }, { x: 7.5, y: 6.5 }, 0.4)).toEqual({ kind: 'clear' });
    });

    it('stops at the last clear sample before a wall', () => {
      const validator = validatorFor(wallColumnRows);
      const step = validator.simulateStep({ x: 4.0, y: 5.5 }, { x: 6.5, y: 5.5 }, 0.4);

      expect(step.kind).toBe('partial');
      if (step.kind === 'partial') {
        expect(step.reached.x).toBeCloseTo(4.5, 10);
        expect(step.reached.y).toBe(5.5);
      }
    });

    it('is stuck when the very first sample is blocked', () => {
      const validator = validatorFor(wallColumnRows);
      expect(validator.simulateStep({ x: 4.5, y: 5.5 }, { x: 6.5, y: 5.5 }, 0.4)).toEqual({ kind: 'stuck' });
    });

    it('is clear for a zero-length step', () => {
      const validator = validatorFor(wallColumnRows);
      expect(validator.simulateStep({ x: 4.5, y: 5.5 }, { x: 4.5, y: 5.5 }, 0.4)).toEqual({ kind: 'clear' });
    });
  });

  describe('validate', () => {
    it('returns a traversable path unchanged', () => {
      const validator = validatorFor(Array.from({ length: 10 }, () => '..........'));
      const path: Path = [{ x: 1.5, y: 1.5 }, { x: 5.5, y: 1.5 }, { x: 5.5, y: 8.5 }];
      expect(validator.validate(path, 0.4)).toEqual(path);
    });

    it('truncates when a stuck step has no usable alternative', () => {
      const validator = validatorFor(wallColumnRows);
      const path: Path = [{ x: 2.5, y: 5.5 }, { x: 4.5, y: 5.5 }, { x: 6.5, y: 5.5 }, { x: 8.5, y: 5.5 }];
      expect(validator.validate(path, 0.4)).toEqual([{ x: 2.5, y: 5.5 }, { x: 4.5, y: 5.5 }]);
    });

    it('swaps in an offset target when the direct step is squeezed', () => {
      const rows = Array.from({ length: 10 }, () => '..........');
      const validator = validatorFor(rows, {
        entities: [
          { id: 'north-guard', kind: 'npc', position: { x: 2.25, y: 4.5 } },
          { id: 'south-guard', kind: 'npc', position: { x: 2.25, y: 6.5 } },
        ],
      });
      const out = validator.validate([{ x: 2.0, y: 5.5 }, { x: 4.0, y: 5.5 }], 0.4);

      expect(out).toHaveLength(2);
      expect(out[1].x).toBeCloseTo(4.3, 10);
      expect(out[1].y).toBe(5.5);
    });

    it('never returns more points than it was given', () => {
      const validator = validatorFor(wallColumnRows);
      const path: Path = [{ x: 1.5, y: 1.5 }, { x: 4.0, y: 1.5 }, { x: 7.5, y: 1.5 }];
      expect(validator.validate(path, 0.4).length).toBeLessThanOrEqual(path.length);
    });
  });
});
