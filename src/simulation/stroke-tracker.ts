import type { Point } from "./brush";

export interface StrokeSegment {
  start: Point;
  end: Point;
}

/**
 * Turns a stream of pointer samples into brush segments.
 *
 * While the pointer is active each sample yields the segment from the previous
 * active position to this one; the first sample of a stroke yields a dot
 * (start equals end). Releasing the pointer ends the stroke. Cells already
 * painted stay painted.
 */
export class StrokeTracker {
  private previous: Point | null = null;

  get isDrawing(): boolean {
    return this.previous !== null;
  }

  sample(position: Point, active: boolean): StrokeSegment | null {
    if (!active) {
      this.previous = null;
      return null;
    }
    const start = this.previous ?? position;
    this.previous = position;
    return { start, end: position };
  }

  release(): void {
    this.previous = null;
  }
}
