import { describe, it, expect } from 'vitest';
import path from 'path';
import { parseMap, loadMapFile } from '../src/map-file';

const smallMap = {
  name: 'yard',
  rows: ['....', '.#D.', '....'],
  obstacles: [{ id: 'well', kind: 'object', position: { x: 0.5, y: 0.5 } }],
  entities: [{ id: 'cat', kind: 'npc', position: { x: 3.5, y: 2.5 } }],
};

describe('parseMap', () => {
  it('builds a world from valid JSON', () => {
    const { name, world } = parseMap(JSON.stringify(smallMap), 'yard.json');
    expect(name).toBe('yard');
    expect(world.width).toBe(4);
    expect(world.height).toBe(3);
    expect(world.getTileType(2, 1)).toBe('door');
    expect(world.entities()).toEqual(smallMap.entities);
  });

  it('defaults blocksMovement to true', () => {
    const { world } = parseMap(JSON.stringify(smallMap), 'yard.json');
    expect(world.obstacles()[0].blocksMovement).toBe(true);
  });

  it('defaults obstacles and entities to empty lists', () => {
    const { world } = parseMap(JSON.stringify({ name: 'bare', rows: ['..'] }), 'bare.json');
    expect(world.obstacles()).toEqual([]);
    expect(world.entities()).toEqual([]);
  });

  it('prefixes JSON syntax errors with the source', () => {
    expect(() => parseMap('{ not json', 'broken.json')).toThrow(/^broken\.json: not valid JSON/);
  });

  it('lists schema problems with their paths', () => {
    expect(() => parseMap(JSON.stringify({ name: 'x', rows: [] }), 'empty.json')).toThrow(/^empty\.json: rows:/);
  });

  it('rejects unknown entity kinds', () => {
    const bad = { ...smallMap, entities: [{ id: 'ghost', kind: 'spirit', position: { x: 1, y: 1 } }] };
    expect(() => parseMap(JSON.stringify(bad), 'yard.json')).toThrow(/^yard\.json: entities\.0\.kind:/);
  });

  it('reports tile errors with the source', () => {
    const bad = { name: 'x', rows: ['.?.'] };
    expect(() => parseMap(JSON.stringify(bad), 'odd.json')).toThrow("odd.json: Unknown tile character '?' in row 0");
  });
});

describe('loadMapFile', () => {
  it('loads the bundled hamlet map', () => {
    const { name, world } = loadMapFile(path.resolve(__dirname, '..', 'maps', 'hamlet.json'));
    expect(name).toBe('hamlet');
    expect(world.width).toBeGreaterThan(0);
    expect(world.height).toBeGreaterThan(0);
  });
});
