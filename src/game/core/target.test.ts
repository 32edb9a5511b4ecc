import { describe, expect, it } from 'vitest';
import { activateTarget, createTarget, deactivateTarget, hitTestTarget, tickTarget } from './target';

const makeTarget = () => createTarget(0, { x: 200, y: 166 }, 44, 1200);

describe('target lifecycle', () => {
  it('starts hidden', () => {
    expect(makeTarget()).toMatchObject({ index: 0, active: false, activatedAt: 0, visibleMs: 1200 });
  });

  it('records the activation time', () => {
    const t = makeTarget();
    activateTarget(t, 5000);
    expect(t.active).toBe(true);
    expect(t.activatedAt).toBe(5000);
  });

  it('deactivates idempotently', () => {
    const t = makeTarget();
    activateTarget(t, 0);
    deactivateTarget(t);
    deactivateTarget(t);
    expect(t.active).toBe(false);
  });

  it('expires only once the visible window is exceeded', () => {
    const t = makeTarget();
    activateTarget(t, 1000);
    tickTarget(t, 2200);
    expect(t.active).toBe(true);
    tickTarget(t, 2201);
    expect(t.active).toBe(false);
  });

  it('leaves an inactive target alone on tick', () => {
    const t = makeTarget();
    tickTarget(t, 99999);
    expect(t).toMatchObject({ active: false, activatedAt: 0 });
  });
});

describe('hitTestTarget', () => {
  it('never hits an inactive target', () => {
    expect(hitTestTarget(makeTarget(), { x: 200, y: 166 })).toBe(false);
  });

  it('covers the square around the center, open on the far edges', () => {
    const t = makeTarget();
    activateTarget(t, 0);
    expect(hitTestTarget(t, { x: 200, y: 166 })).toBe(true);
    expect(hitTestTarget(t, { x: 156, y: 122 })).toBe(true);
    expect(hitTestTarget(t, { x: 243, y: 209 })).toBe(true);
    expect(hitTestTarget(t, { x: 244, y: 166 })).toBe(false);
    expect(hitTestTarget(t, { x: 155, y: 166 })).toBe(false);
    expect(hitTestTarget(t, { x: 200, y: 210 })).toBe(false);
  });
});
