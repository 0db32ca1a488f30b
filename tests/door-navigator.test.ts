import { describe, it, expect } from 'vitest';
import { DoorNavigator } from '../src/door-navigator';
import { DoorContextAnalyzer } from '../src/door-context';
import { TileWorld } from '../src/world';
import { DEFAULT_NAV_TUNING } from '../src/tuning';
import type { Path, Point } from '../src/types';

/** 10x10 with a wall row at y = 5 and a door at (5, 5) */
function horizontalDoorNavigator(): DoorNavigator {
  const rows = Array.from({ length: 10 }, (_, y) => (y === 5 ? '#####D####' : '..........'));
  return new DoorNavigator(new DoorContextAnalyzer(TileWorld.fromRows(rows), DEFAULT_NAV_TUNING), DEFAULT_NAV_TUNING);
}

function expectPath(actual: Path, expected: Point[]): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((p, i) => {
    expect(actual[i].x).toBeCloseTo(p.x, 10);
    expect(actual[i].y).toBeCloseTo(p.y, 10);
  });
}

describe('DoorNavigator', () => {
  describe('doorsCrossed', () => {
    it('finds the door a segment passes through', () => {
      const nav = horizontalDoorNavigator();
      expect(nav.doorsCrossed({ x: 4.5, y: 3.5 }, { x: 5.5, y: 7.5 })).toEqual([{ x: 5, y: 5 }]);
    });

    it('finds nothing on a segment that stays on one side', () => {
      const nav = horizontalDoorNavigator();
      expect(nav.doorsCrossed({ x: 1.5, y: 1.5 }, { x: 8.5, y: 3.5 })).toEqual([]);
    });

    it('finds nothing for a zero-length segment', () => {
      const nav = horizontalDoorNavigator();
      expect(nav.doorsCrossed({ x: 5.5, y: 5.5 }, { x: 5.5, y: 5.5 })).toEqual([]);
    });
  });

  describe('approachSide', () => {
    it('picks north or south for horizontal doors', () => {
      const nav = horizontalDoorNavigator();
      expect(nav.approachSide({ x: 9, y: 2 }, { x: 5.5, y: 5.5 }, 'horizontal')).toBe('north');
      expect(nav.approachSide({ x: 1, y: 8 }, { x: 5.5, y: 5.5 }, 'horizontal')).toBe('south');
    });

    it('picks west or east for vertical doors', () => {
      const nav = horizontalDoorNavigator();
      expect(nav.approachSide({ x: 2, y: 9 }, { x: 5.5, y: 5.5 }, 'vertical')).toBe('west');
      expect(nav.approachSide({ x: 8, y: 1 }, { x: 5.5, y: 5.5 }, 'vertical')).toBe('east');
    });
  });

  describe('enhance', () => {
    it('adds alignment, approach, centre and exit for an off-axis approach', () => {
      const nav = horizontalDoorNavigator();
      const out = nav.enhance([{ x: 4.5, y: 3.5 }, { x: 5.5, y: 7.5 }], 0.4);

      expectPath(out, [
        { x: 4.5, y: 3.5 },
        { x: 5.5, y: 4.5 },
        { x: 5.5, y: 4.8 },
        { x: 5.5, y: 5.5 },
        { x: 5.5, y: 6.3 },
        { x: 5.5, y: 7.5 },
      ]);
    });

    it('skips alignment when already on the door axis', () => {
      const nav = horizontalDoorNavigator();
      const out = nav.enhance([{ x: 5.4, y: 2.5 }, { x: 5.4, y: 8.5 }], 0.4);

      expectPath(out, [
        { x: 5.4, y: 2.5 },
        { x: 5.5, y: 4.8 },
        { x: 5.5, y: 5.5 },
        { x: 5.5, y: 6.3 },
        { x: 5.4, y: 8.5 },
      ]);
    });

    it('crosses a door once even when two segments touch it', () => {
      const nav = horizontalDoorNavigator();
      const out = nav.enhance([{ x: 5.5, y: 3.5 }, { x: 5.5, y: 5.5 }, { x: 5.5, y: 7.5 }], 0.4);

      expectPath(out, [
        { x: 5.5, y: 3.5 },
        { x: 5.5, y: 4.8 },
        { x: 5.5, y: 5.5 },
        { x: 5.5, y: 6.3 },
        { x: 5.5, y: 7.5 },
      ]);
    });

    it('does not step back towards the door after the exit waypoint', () => {
      const nav = horizontalDoorNavigator();
      const out = nav.enhance(
        [{ x: 5.5, y: 3.5 }, { x: 5.5, y: 5.5 }, { x: 5.5, y: 6.0 }, { x: 5.53, y: 6.22 }, { x: 5.5, y: 7.5 }],
        0.4,
      );

      expectPath(out, [
        { x: 5.5, y: 3.5 },
        { x: 5.5, y: 4.8 },
        { x: 5.5, y: 5.5 },
        { x: 5.5, y: 6.3 },
        { x: 5.5, y: 7.5 },
      ]);
    });

    it('keeps points beside the exit that lie outside the door column', () => {
      const nav = horizontalDoorNavigator();
      const out = nav.enhance([{ x: 5.5, y: 3.5 }, { x: 5.5, y: 5.5 }, { x: 7.5, y: 6.0 }, { x: 8.5, y: 7.5 }], 0.4);

      expectPath(out, [
        { x: 5.5, y: 3.5 },
        { x: 5.5, y: 4.8 },
        { x: 5.5, y: 5.5 },
        { x: 5.5, y: 6.3 },
        { x: 7.5, y: 6.0 },
        { x: 8.5, y: 7.5 },
      ]);
    });

    it('widens clearances for larger bodies', () => {
      const nav = horizontalDoorNavigator();
      const out = nav.enhance([{ x: 5.5, y: 8.5 }, { x: 5.5, y: 1.5 }], 0.8);

      // approach max(0.7, 0.8 + 0.3), exit max(0.8, 0.8 + 0.4), from the south
      expectPath(out, [
        { x: 5.5, y: 8.5 },
        { x: 5.5, y: 6.6 },
        { x: 5.5, y: 5.5 },
        { x: 5.5, y: 4.3 },
        { x: 5.5, y: 1.5 },
      ]);
    });

    it('leaves door-free paths alone', () => {
      const nav = horizontalDoorNavigator();
      const path: Path = [{ x: 1.5, y: 1.5 }, { x: 8.5, y: 3.5 }];
      expect(nav.enhance(path, 0.4)).toEqual(path);
    });
  });
});
