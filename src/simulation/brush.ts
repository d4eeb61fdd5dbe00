import type { Grid, RGB } from "./grid";

/** A position in grid coordinates with sub-cell precision; cell (x, y) spans [x, x + 1) × [y, y + 1). */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export type BrushShape = "circle" | "square";

export const BRUSH_SHAPES: readonly BrushShape[] = ["circle", "square"];

/** One brush stroke segment, built fresh for every pointer movement. */
export interface Brush {
  readonly start: Point;
  readonly end: Point;
  readonly radius: number;
  readonly shape: BrushShape;
  readonly color: RGB;
}

/** Closest point to `pos` on the segment start..end. A zero-length segment returns `start`. */
export function closestPointOnSegment(start: Point, end: Point, pos: Point): Point {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const lengthSq = dx * dx + dy * dy;
  if (lengthSq === 0) return start;
  const t = Math.max(0, Math.min(1, ((pos.x - start.x) * dx + (pos.y - start.y) * dy) / lengthSq));
  return { x: start.x + t * dx, y: start.y + t * dy };
}

/**
 * Whether `pos` lies inside the brush shape swept along the stroke.
 *
 * Square: inside the radius box around the closest point on the segment.
 * Circle: inside that box, and the distance to the closest point rounds to at
 * most the radius (so the boundary is inclusive at .5).
 */
export function isInStroke(pos: Point, brush: Brush): boolean {
  const proj = closestPointOnSegment(brush.start, brush.end, pos);
  const dx = pos.x - proj.x;
  const dy = pos.y - proj.y;
  const r = brush.radius;
  if (Math.abs(dx) > r || Math.abs(dy) > r) return false;
  if (brush.shape === "square") return true;
  return Math.round(Math.sqrt(dx * dx + dy * dy)) <= r;
}

/** Center of cell (x, y) in grid coordinates. */
export function cellCenter(x: number, y: number): Point {
  return { x: x + 0.5, y: y + 0.5 };
}

/**
 * Paints every cell whose center lies in the swept brush shape, overwriting its
 * color (alpha forced to 1). Cells outside the grid are clipped, never wrapped.
 * A radius of zero or less disables the brush. Returns the number of cells painted.
 */
export function drawStroke(grid: Grid, brush: Brush): number {
  if (!(brush.radius > 0)) return 0;

  const r = brush.radius;
  const { start, end } = brush;
  // Cells whose centers can fall within r of the segment, clipped to the grid.
  const xMin = Math.max(0, Math.ceil(Math.min(start.x, end.x) - r - 0.5));
  const xMax = Math.min(grid.width - 1, Math.floor(Math.max(start.x, end.x) + r - 0.5));
  const yMin = Math.max(0, Math.ceil(Math.min(start.y, end.y) - r - 0.5));
  const yMax = Math.min(grid.height - 1, Math.floor(Math.max(start.y, end.y) + r - 0.5));

  let painted = 0;
  for (let y = yMin; y <= yMax; y++) {
    for (let x = xMin; x <= xMax; x++) {
      if (isInStroke(cellCenter(x, y), brush)) {
        grid.setCell(x, y, brush.color);
        painted++;
      }
    }
  }
  return painted;
}
