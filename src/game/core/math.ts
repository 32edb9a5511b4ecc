import type { Rect, Size, Vec2 } from './types';

export const clamp = (v: number, min: number, max: number) => Math.max(min, Math.min(max, v));

/** Half-open on the far edges, like a pixel rect. */
export const rectContains = (rect: Rect, p: Vec2) => (
  p.x >= rect.x && p.x < rect.x + rect.width &&
  p.y >= rect.y && p.y < rect.y + rect.height
);

export const rectAround = (center: Vec2, size: Size): Rect => ({
  x: center.x - Math.floor(size.width / 2),
  y: center.y - Math.floor(size.height / 2),
  width: size.width,
  height: size.height,
});

export type RandomSource = () => number;

/** Uniform integer in [0, count). */
export const pickIndex = (count: number, random: RandomSource = Math.random) => (
  clamp(Math.floor(random() * count), 0, count - 1)
);
