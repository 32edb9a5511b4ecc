import { rectAround, rectContains } from './math';
import type { Rect, Target, Vec2 } from './types';

export const createTarget = (index: number, pos: Vec2, radius: number, visibleMs: number): Target => ({
  index,
  pos: { ...pos },
  radius,
  visibleMs,
  active: false,
  activatedAt: 0,
});

// The caller deactivates whatever was showing before; a target does not know about its siblings.
export const activateTarget = (target: Target, now: number) => {
  target.active = true;
  target.activatedAt = now;
};

export const deactivateTarget = (target: Target) => {
  target.active = false;
};

/** Expires the target once it has been up for longer than its visible window. */
export const tickTarget = (target: Target, now: number) => {
  if (target.active && now - target.activatedAt > target.visibleMs) deactivateTarget(target);
};

export const targetHitRect = (target: Target): Rect => (
  rectAround(target.pos, { width: target.radius * 2, height: target.radius * 2 })
);

export const hitTestTarget = (target: Target, point: Vec2) => target.active && rectContains(targetHitRect(target), point);
