import { canvasToGrid, computeViewport } from "./grid-utils";

describe("computeViewport", () => {
  it("fits the grid's width and centers it vertically", () => {
    expect(computeViewport(800, 600, 320, 180)).toEqual({ x: 0, y: 75, scale: 2.5 });
  });

  it("fits the grid's height and centers it horizontally", () => {
    expect(computeViewport(500, 100, 4, 2)).toEqual({ x: 150, y: 0, scale: 50 });
  });
});

describe("canvasToGrid", () => {
  it("maps canvas pixels to grid coordinates", () => {
    const viewport = computeViewport(800, 600, 320, 180);
    expect(canvasToGrid(400, 300, viewport)).toEqual({ x: 160, y: 90 });
    expect(canvasToGrid(0, 75, viewport)).toEqual({ x: 0, y: 0 });
  });

  it("returns positions outside the grid unchanged so strokes can be clipped", () => {
    const viewport = computeViewport(800, 600, 320, 180);
    expect(canvasToGrid(400, 0, viewport)).toEqual({ x: 160, y: -30 });
  });

  it("gives NaN for an empty viewport", () => {
    const point = canvasToGrid(1, 1, computeViewport(0, 0, 4, 4));
    expect(point.x).toBeNaN();
  });
});
