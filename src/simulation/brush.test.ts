import { closestPointOnSegment, drawStroke, isInStroke, type Brush, type BrushShape, type Point } from "./brush";
import { Grid } from "./grid";

const RED = [1, 0, 0] as const;

function dot(at: Point, radius: number, shape: BrushShape): Brush {
  return { start: at, end: at, radius, shape, color: RED };
}

/** Sorted "x,y" keys of the cells whose red channel is 1. */
function paintedCells(grid: Grid): string[] {
  const out: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (grid.get(x, y, 0) === 1) out.push(`${x},${y}`);
    }
  }
  return out;
}

describe("closestPointOnSegment", () => {
  it("projects onto the segment and clamps to its ends", () => {
    const a = { x: 0, y: 0 };
    const b = { x: 4, y: 0 };
    expect(closestPointOnSegment(a, b, { x: 1, y: 3 })).toEqual({ x: 1, y: 0 });
    expect(closestPointOnSegment(a, b, { x: -2, y: 1 })).toEqual({ x: 0, y: 0 });
    expect(closestPointOnSegment(a, b, { x: 9, y: -1 })).toEqual({ x: 4, y: 0 });
  });

  it("returns the start of a zero-length segment", () => {
    const p = { x: 2, y: 2 };
    expect(closestPointOnSegment(p, p, { x: 5, y: 5 })).toBe(p);
  });
});

describe("isInStroke", () => {
  it("includes the circle boundary when the distance rounds down to the radius", () => {
    const brush = dot({ x: 0, y: 0 }, 1, "circle");
    // distance sqrt(2) rounds to 1
    expect(isInStroke({ x: 1, y: 1 }, brush)).toBe(true);
    expect(isInStroke({ x: 1.5, y: 0 }, brush)).toBe(false);
  });

  it("treats the square as the radius box around the segment", () => {
    const brush = dot({ x: 0, y: 0 }, 1, "square");
    expect(isInStroke({ x: 1, y: -1 }, brush)).toBe(true);
    expect(isInStroke({ x: 1.01, y: 0 }, brush)).toBe(false);
  });
});

describe("drawStroke", () => {
  it("paints a circular dot without its far corners", () => {
    const grid = new Grid(7, 7);
    const painted = drawStroke(grid, dot({ x: 3.5, y: 3.5 }, 2.5, "circle"));
    expect(painted).toBe(21);
    // the 5x5 block around (3, 3) minus its four corners
    expect(paintedCells(grid)).toEqual([
      "2,1", "3,1", "4,1",
      "1,2", "2,2", "3,2", "4,2", "5,2",
      "1,3", "2,3", "3,3", "4,3", "5,3",
      "1,4", "2,4", "3,4", "4,4", "5,4",
      "2,5", "3,5", "4,5",
    ]);
  });

  it("paints a full square dot", () => {
    const grid = new Grid(7, 7);
    expect(drawStroke(grid, dot({ x: 3.5, y: 3.5 }, 2, "square"))).toBe(25);
    expect(paintedCells(grid)).toContain("1,1");
    expect(paintedCells(grid)).toContain("5,5");
    expect(grid.get(0, 3, 0)).toBe(0);
  });

  it("clips at the grid edges instead of wrapping", () => {
    const corner = new Grid(7, 7);
    expect(drawStroke(corner, dot({ x: 0.5, y: 0.5 }, 2, "square"))).toBe(9);
    expect(corner.get(6, 6, 0)).toBe(0);

    const side = new Grid(7, 7);
    expect(drawStroke(side, dot({ x: 6.5, y: 3.5 }, 2, "square"))).toBe(15);
    for (let y = 0; y < 7; y++) {
      expect(side.get(0, y, 0)).toBe(0);
    }
  });

  it("sweeps the shape along the segment", () => {
    const grid = new Grid(7, 3);
    const painted = drawStroke(grid, {
      start: { x: 0.5, y: 0.5 }, end: { x: 6.5, y: 0.5 }, radius: 1, shape: "circle", color: RED,
    });
    expect(painted).toBe(14);
    for (let x = 0; x < 7; x++) {
      expect(grid.get(x, 0, 0)).toBe(1);
      expect(grid.get(x, 1, 0)).toBe(1);
      expect(grid.get(x, 2, 0)).toBe(0);
    }
  });

  it("paints a single row for a thin square stroke", () => {
    const grid = new Grid(7, 7);
    const painted = drawStroke(grid, {
      start: { x: 1.5, y: 3.5 }, end: { x: 5.5, y: 3.5 }, radius: 0.5, shape: "square", color: RED,
    });
    expect(painted).toBe(5);
    expect(paintedCells(grid)).toEqual(["1,3", "2,3", "3,3", "4,3", "5,3"]);
  });

  it("overwrites the color and sets alpha to 1", () => {
    const grid = new Grid(3, 3);
    grid.fill([0.2, 0.4, 0.6]);
    drawStroke(grid, { ...dot({ x: 1.5, y: 1.5 }, 0.5, "square"), color: [0, 0.5, 1] });
    expect([0, 1, 2, 3].map((c) => grid.get(1, 1, c))).toEqual([0, 0.5, 1, 1]);
    expect(grid.get(0, 0, 0)).toBeCloseTo(0.2, 6);
  });

  it("does nothing with a zero or negative radius", () => {
    const grid = new Grid(3, 3);
    expect(drawStroke(grid, dot({ x: 1.5, y: 1.5 }, 0, "circle"))).toBe(0);
    expect(drawStroke(grid, dot({ x: 1.5, y: 1.5 }, -2, "square"))).toBe(0);
    expect(paintedCells(grid)).toEqual([]);
  });

  it("paints nothing for a stroke entirely off the grid", () => {
    const grid = new Grid(4, 4);
    expect(drawStroke(grid, dot({ x: -10, y: 2 }, 3, "circle"))).toBe(0);
  });
});
