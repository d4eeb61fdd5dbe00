import { GRID_HEIGHT, GRID_WIDTH } from "../constants";
import type { IGrid } from "../types/grid-types";
import { drawStroke, type Brush } from "./brush";
import { step, type StepResult } from "./convolution";
import { GridBuffers } from "./grid-buffers";
import { seedGrid } from "./initializer";
import { DEFAULT_PARAMETERS, type ParameterSnapshot } from "./parameters";

export interface NcaEngineOptions {
  width?: number;
  height?: number;
  /** Called once per step for the filters and activations to use. */
  getParameters?: () => ParameterSnapshot;
}

/**
 * Owns the two grid buffers and everything that writes to them.
 *
 * Brush strokes are queued and only touch the current buffer in
 * applyPendingStrokes(), which step() calls first, so a stroke and a step
 * never write the same buffer at the same time and painted cells feed the
 * step that follows them.
 */
export class NcaEngine {
  readonly buffers: GridBuffers;
  stepCount = 0;
  /** Non-finite activation outputs seen in the most recent step. */
  lastNonFiniteCount = 0;

  private readonly getParameters: () => ParameterSnapshot;
  private pendingStrokes: Brush[] = [];
  private warnedNonFinite = false;

  constructor(options: NcaEngineOptions = {}) {
    this.buffers = new GridBuffers(options.width ?? GRID_WIDTH, options.height ?? GRID_HEIGHT);
    this.getParameters = options.getParameters ?? (() => DEFAULT_PARAMETERS);
    this.reset();
  }

  get current(): IGrid {
    return this.buffers.current();
  }

  get pendingStrokeCount(): number {
    return this.pendingStrokes.length;
  }

  /** Re-seeds the current buffer and drops strokes queued against the old state. */
  reset(): void {
    seedGrid(this.buffers.currentMut());
    this.pendingStrokes = [];
    this.stepCount = 0;
    this.lastNonFiniteCount = 0;
    this.warnedNonFinite = false;
  }

  queueStroke(brush: Brush): void {
    if (!(brush.radius > 0)) return;
    this.pendingStrokes.push(brush);
  }

  /** Paints queued strokes into the current buffer, in order. Returns cells painted. */
  applyPendingStrokes(): number {
    if (this.pendingStrokes.length === 0) return 0;
    const strokes = this.pendingStrokes;
    this.pendingStrokes = [];
    const grid = this.buffers.currentMut();
    let painted = 0;
    for (const brush of strokes) {
      painted += drawStroke(grid, brush);
    }
    return painted;
  }

  /**
   * Advance one step:
   *
   * 1. Paint queued strokes into the current buffer
   * 2. Take one parameter snapshot
   * 3. Convolve current -> scratch, then swap
   */
  step(): StepResult {
    this.applyPendingStrokes();
    const { filters, activations } = this.getParameters();
    const result = this.buffers.transition((src, dst) => step(src, dst, filters, activations));
    this.stepCount++;
    this.lastNonFiniteCount = result.nonFiniteCount;
    if (result.nonFiniteCount > 0 && !this.warnedNonFinite) {
      this.warnedNonFinite = true;
      console.warn(
        `Step ${this.stepCount}: ${result.nonFiniteCount} activation output(s) were not finite; clamped NaN to 0`);
    }
    return result;
  }
}
