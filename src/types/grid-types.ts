/**
 * Read-only view of a simulation grid.
 * The step reads its source through it; rendering and image encoding read the
 * current buffer through it without being able to modify it.
 *
 * Cells are stored row-major with a top-left origin, four floats per cell
 * (red, green, blue, alpha).
 */
export interface IGrid {
  readonly width: number;
  readonly height: number;
  readonly cells: Readonly<Float32Array>;

  /** Channel value at (x, y), with both coordinates wrapped onto the torus. */
  getWrapped(x: number, y: number, channel: number): number;

  /** Channel value at an in-range (x, y). Throws on out-of-range coordinates. */
  get(x: number, y: number, channel: number): number;
}
