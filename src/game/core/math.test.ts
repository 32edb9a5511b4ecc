import { describe, expect, it } from 'vitest';
import { pickIndex, rectAround, rectContains } from './math';

describe('pickIndex', () => {
  it('maps the unit interval evenly onto the slots', () => {
    expect(pickIndex(9, () => 0)).toBe(0);
    expect(pickIndex(9, () => 0.5)).toBe(4);
    expect(pickIndex(9, () => 0.999)).toBe(8);
  });

  it('stays in range for a source that returns 1', () => {
    expect(pickIndex(9, () => 1)).toBe(8);
  });
});

describe('rects', () => {
  it('centers a box on a point', () => {
    expect(rectAround({ x: 100, y: 50 }, { width: 20, height: 10 })).toEqual({ x: 90, y: 45, width: 20, height: 10 });
  });

  it('includes the near edges and excludes the far ones', () => {
    const rect = { x: 10, y: 10, width: 5, height: 5 };
    expect(rectContains(rect, { x: 10, y: 10 })).toBe(true);
    expect(rectContains(rect, { x: 14, y: 14 })).toBe(true);
    expect(rectContains(rect, { x: 15, y: 12 })).toBe(false);
    expect(rectContains(rect, { x: 12, y: 15 })).toBe(false);
  });
});
