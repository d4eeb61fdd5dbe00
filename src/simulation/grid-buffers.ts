import type { IGrid } from "../types/grid-types";
import { Grid } from "./grid";

/**
 * Ping-pong pair of equally sized grids.
 *
 * Exactly one grid is current at a time: it is what gets rendered, painted
 * into and read as the next step's input. The other is scratch space that only
 * transition() writes to, and it only becomes visible once fully written.
 */
export class GridBuffers {
  private readonly grids: readonly [Grid, Grid];
  private currentIndex: 0 | 1 = 0;

  constructor(width: number, height: number) {
    this.grids = [new Grid(width, height), new Grid(width, height)];
  }

  get width(): number {
    return this.grids[0].width;
  }

  get height(): number {
    return this.grids[0].height;
  }

  current(): IGrid {
    return this.grids[this.currentIndex];
  }

  /** The current grid, writable. Only brush strokes and the initializer use this. */
  currentMut(): Grid {
    return this.grids[this.currentIndex];
  }

  /** Exchanges which grid is current. */
  swap(): void {
    this.currentIndex = this.currentIndex === 0 ? 1 : 0;
  }

  /**
   * Runs `write` with the current grid as source and the scratch grid as
   * destination, then swaps so the freshly written grid becomes current.
   */
  transition<T>(write: (src: IGrid, dst: Grid) => T): T {
    const src = this.grids[this.currentIndex];
    const dst = this.grids[this.currentIndex === 0 ? 1 : 0];
    const result = write(src, dst);
    this.swap();
    return result;
  }
}
