import { CELL_STRIDE } from "../constants";
import type { IGrid } from "../types/grid-types";
import { CellOutOfRangeError, GridDimensionError } from "./errors";

/** A solid color as [r, g, b], each nominally in 0..1. */
export type RGB = readonly [number, number, number];

export function wrapCoord(v: number, size: number): number {
  return ((v % size) + size) % size;
}

/** Rejects dimensions a grid can't be created with. */
export function validateDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new GridDimensionError(`Grid dimensions must be positive integers, got ${width}x${height}`);
  }
}

/**
 * Fixed-size grid of RGBA cells on a torus.
 *
 * cells[(y * width + x) * 4 + channel], top-left origin. Channels 0..2 carry
 * the automaton state; channel 3 is alpha and is kept at 1.
 *
 * Reads through getWrapped() wrap both axes, so edges have no special case.
 * Direct reads and writes through get()/setCell() must be in range and throw
 * otherwise.
 */
export class Grid implements IGrid {
  readonly width: number;
  readonly height: number;
  readonly cells: Float32Array;

  constructor(width: number, height: number) {
    validateDimensions(width, height);
    this.width = width;
    this.height = height;
    this.cells = new Float32Array(width * height * CELL_STRIDE);
  }

  contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /** Offset of the cell's first channel in `cells`. Throws when (x, y) is out of range. */
  offset(x: number, y: number): number {
    if (!this.contains(x, y)) {
      throw new CellOutOfRangeError(x, y, this.width, this.height);
    }
    return (y * this.width + x) * CELL_STRIDE;
  }

  wrappedOffset(x: number, y: number): number {
    return (wrapCoord(y, this.height) * this.width + wrapCoord(x, this.width)) * CELL_STRIDE;
  }

  getWrapped(x: number, y: number, channel: number): number {
    return this.cells[this.wrappedOffset(x, y) + channel];
  }

  get(x: number, y: number, channel: number): number {
    return this.cells[this.offset(x, y) + channel];
  }

  /** Overwrites the cell's color and forces its alpha to 1. */
  setCell(x: number, y: number, color: RGB): void {
    const i = this.offset(x, y);
    this.cells[i] = color[0];
    this.cells[i + 1] = color[1];
    this.cells[i + 2] = color[2];
    this.cells[i + 3] = 1;
  }

  fill(color: RGB): void {
    for (let i = 0; i < this.cells.length; i += CELL_STRIDE) {
      this.cells[i] = color[0];
      this.cells[i + 1] = color[1];
      this.cells[i + 2] = color[2];
      this.cells[i + 3] = 1;
    }
  }
}
