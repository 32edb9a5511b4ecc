import { EXIT_CONTROL } from './config';
import type { BoardLayout, Rect, Size, Vec2 } from './types';

/**
 * Hideout centers for a rows x cols grid, inset by an eighth of the width and a sixth of the
 * height, in row-major order. Every hideout shares one radius, a third of the smaller cell side.
 */
export const computeLayout = (width: number, height: number, rows: number, cols: number): BoardLayout => {
  const marginX = Math.floor(width / 8);
  const marginY = Math.floor(height / 6);
  const cellW = Math.floor((width - 2 * marginX) / cols);
  const cellH = Math.floor((height - 2 * marginY) / rows);

  const positions: Vec2[] = [];
  for (let row = 0; row < rows; row += 1) {
    for (let col = 0; col < cols; col += 1) {
      positions.push({
        x: marginX + cellW * col + Math.floor(cellW / 2),
        y: marginY + cellH * row + Math.floor(cellH / 2),
      });
    }
  }

  return {
    positions: Object.freeze(positions),
    radius: Math.floor(Math.min(cellW, cellH) / 3),
  };
};

/** Button box around the rendered "Exit" label, top-right corner pinned to the anchor. */
export const computeExitRect = (labelSize: Size = EXIT_CONTROL.estimatedLabelSize): Rect => {
  const width = Math.ceil(labelSize.width) + EXIT_CONTROL.padding.x * 2;
  const height = Math.ceil(labelSize.height) + EXIT_CONTROL.padding.y * 2;
  return {
    x: EXIT_CONTROL.anchor.x - width,
    y: EXIT_CONTROL.anchor.y,
    width,
    height,
  };
};
