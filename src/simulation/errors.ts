/** Thrown when a grid is created with unusable dimensions, or two grids that must match don't. */
export class GridDimensionError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "GridDimensionError";
  }
}

/** Thrown by direct (non-wrapped) cell access outside the grid. */
export class CellOutOfRangeError extends RangeError {
  constructor(readonly x: number, readonly y: number, readonly width: number, readonly height: number) {
    super(`Cell (${x}, ${y}) is outside the ${width}x${height} grid`);
    this.name = "CellOutOfRangeError";
  }
}

/** Thrown when an activation expression can't be turned into a callable. */
export class ActivationCompileError extends Error {
  constructor(readonly expression: string, reason: string) {
    super(`Invalid activation "${expression}": ${reason}`);
    this.name = "ActivationCompileError";
  }
}
