import { describe, expect, it } from 'vitest';
import { computeExitRect, computeLayout } from './layout';

describe('computeLayout', () => {
  const layout = computeLayout(800, 600, 3, 3);

  it('places nine hideouts in row-major order', () => {
    expect(layout.positions).toHaveLength(9);
    expect(layout.positions[0]).toEqual({ x: 200, y: 166 });
    expect(layout.positions[1]).toEqual({ x: 400, y: 166 });
    expect(layout.positions[3]).toEqual({ x: 200, y: 299 });
    expect(layout.positions[8]).toEqual({ x: 600, y: 432 });
  });

  it('derives an integer radius from the smaller cell side', () => {
    expect(layout.radius).toBe(44);
    expect(Number.isInteger(layout.radius)).toBe(true);
  });

  it('keeps every position distinct and inside the window', () => {
    const keys = new Set(layout.positions.map((p) => `${p.x},${p.y}`));
    expect(keys.size).toBe(9);
    for (const p of layout.positions) {
      expect(p.x).toBeGreaterThan(0);
      expect(p.x).toBeLessThan(800);
      expect(p.y).toBeGreaterThan(0);
      expect(p.y).toBeLessThan(600);
    }
  });

  it('is deterministic', () => {
    expect(computeLayout(800, 600, 3, 3)).toEqual(layout);
  });

  it('follows other grid shapes', () => {
    const wide = computeLayout(800, 600, 2, 4);
    expect(wide.positions).toHaveLength(8);
    expect(wide.positions[0]).toEqual({ x: 175, y: 200 });
    expect(wide.radius).toBe(50);
  });
});

describe('computeExitRect', () => {
  it('pads the label and pins the box to the top-right anchor', () => {
    expect(computeExitRect({ width: 44, height: 32 })).toEqual({ x: 726, y: 70, width: 64, height: 44 });
  });

  it('rounds fractional label metrics up', () => {
    expect(computeExitRect({ width: 40.4, height: 31.2 })).toEqual({ x: 729, y: 70, width: 61, height: 44 });
  });
});
