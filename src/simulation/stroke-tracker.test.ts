import { StrokeTracker } from "./stroke-tracker";

describe("StrokeTracker", () => {
  it("starts a stroke with a dot, then joins consecutive samples", () => {
    const tracker = new StrokeTracker();
    expect(tracker.isDrawing).toBe(false);

    expect(tracker.sample({ x: 1, y: 1 }, true)).toEqual({ start: { x: 1, y: 1 }, end: { x: 1, y: 1 } });
    expect(tracker.isDrawing).toBe(true);
    expect(tracker.sample({ x: 3, y: 2 }, true)).toEqual({ start: { x: 1, y: 1 }, end: { x: 3, y: 2 } });
    expect(tracker.sample({ x: 4, y: 2 }, true)).toEqual({ start: { x: 3, y: 2 }, end: { x: 4, y: 2 } });
  });

  it("ends the stroke on an inactive sample", () => {
    const tracker = new StrokeTracker();
    tracker.sample({ x: 1, y: 1 }, true);
    expect(tracker.sample({ x: 2, y: 2 }, false)).toBeNull();
    expect(tracker.isDrawing).toBe(false);
    // the next stroke does not connect to the last one
    expect(tracker.sample({ x: 5, y: 5 }, true)).toEqual({ start: { x: 5, y: 5 }, end: { x: 5, y: 5 } });
  });

  it("release ends the stroke", () => {
    const tracker = new StrokeTracker();
    tracker.sample({ x: 1, y: 1 }, true);
    tracker.release();
    expect(tracker.isDrawing).toBe(false);
  });
});
