import type { Point } from "../simulation/brush";

/** Where the grid sits inside the canvas: offset in pixels and pixels per cell. */
export interface Viewport {
  x: number;
  y: number;
  scale: number;
}

/** Largest aspect-preserving fit of a gridWidth x gridHeight grid, centered in the canvas. */
export function computeViewport(canvasWidth: number, canvasHeight: number,
    gridWidth: number, gridHeight: number): Viewport {
  const scale = Math.max(0, Math.min(canvasWidth / gridWidth, canvasHeight / gridHeight));
  return {
    x: (canvasWidth - gridWidth * scale) / 2,
    y: (canvasHeight - gridHeight * scale) / 2,
    scale,
  };
}

/** Converts a canvas pixel position to grid coordinates (sub-cell precision, may lie outside the grid). */
export function canvasToGrid(px: number, py: number, viewport: Viewport): Point {
  if (viewport.scale <= 0) return { x: NaN, y: NaN };
  return {
    x: (px - viewport.x) / viewport.scale,
    y: (py - viewport.y) / viewport.scale,
  };
}
