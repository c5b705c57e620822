import { HashMap, HashSet } from './sets.js';

type Point = { x: number; y: number };
const pointKey = (p: Point) => `${p.x},${p.y}`;

describe('HashSet', () => {
  it('compares members by their hash', () => {
    const set = new HashSet(pointKey, [{ x: 1, y: 2 }]);
    expect(set.has({ x: 1, y: 2 })).toBe(true);
    expect(set.has({ x: 2, y: 1 })).toBe(false);
    set.add({ x: 1, y: 2 });
    expect(set.size).toBe(1);
  });

  it('reports whether addAll grew the set', () => {
    const set = new HashSet(pointKey, [{ x: 0, y: 0 }]);
    expect(set.addAll([{ x: 0, y: 0 }])).toBe(false);
    expect(
      set.addAll([
        { x: 0, y: 0 },
        { x: 1, y: 1 },
      ])
    ).toBe(true);
    expect(set.size).toBe(2);
  });

  it('keeps insertion order', () => {
    const set = new HashSet(String, [3, 1, 2, 1]);
    expect([...set]).toEqual([3, 1, 2]);
    set.delete(1);
    expect([...set.values()]).toEqual([3, 2]);
  });

  it('has an order independent hash and equality', () => {
    const a = new HashSet(String, [1, 2, 3]);
    const b = new HashSet(String, [3, 2, 1]);
    expect(a.hash()).toBe('{1,2,3}');
    expect(b.hash()).toBe(a.hash());
    expect(a.equals(b)).toBe(true);
    expect(a.equals(new HashSet(String, [1, 2]))).toBe(false);
    expect(a.equals(new HashSet(String, [1, 2, 4]))).toBe(false);
  });

  it('clears', () => {
    const set = new HashSet(String, [1, 2]);
    set.clear();
    expect(set.size).toBe(0);
    expect(set.hash()).toBe('{}');
  });
});

describe('HashMap', () => {
  it('looks keys up by their hash', () => {
    const map = new HashMap<Point, string>(pointKey, [[{ x: 1, y: 2 }, 'a']]);
    expect(map.get({ x: 1, y: 2 })).toBe('a');
    expect(map.has({ x: 2, y: 1 })).toBe(false);
    expect(map.get({ x: 2, y: 1 })).toBeUndefined();
  });

  it('overwrites in place', () => {
    const map = new HashMap<Point, string>(pointKey);
    map.set({ x: 0, y: 0 }, 'a').set({ x: 1, y: 1 }, 'b');
    map.set({ x: 0, y: 0 }, 'c');
    expect(map.size).toBe(2);
    expect([...map.values()]).toEqual(['c', 'b']);
    expect([...map.keys()]).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 1 },
    ]);
  });

  it('deletes', () => {
    const map = new HashMap<Point, number>(pointKey, [
      [{ x: 0, y: 0 }, 0],
      [{ x: 1, y: 1 }, 1],
    ]);
    expect(map.delete({ x: 0, y: 0 })).toBe(true);
    expect(map.delete({ x: 0, y: 0 })).toBe(false);
    expect([...map]).toEqual([[{ x: 1, y: 1 }, 1]]);
  });
});
