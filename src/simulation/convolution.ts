import { CELL_STRIDE, TILE_SIZE } from "../constants";
import type { IGrid } from "../types/grid-types";
import type { Activation } from "./activation";
import type { ChannelTriple } from "./channels";
import { toKernel, type Filter } from "./filters";
import type { Grid } from "./grid";
import { GridDimensionError } from "./errors";

/** A cell's next state: [red, green, blue, alpha]. */
export type Cell = readonly [number, number, number, number];

export interface StepResult {
  /** Channel values whose activation output was NaN or infinite before clamping. */
  nonFiniteCount: number;
}

/**
 * Clamps to [0, 1]. NaN maps to 0 so a broken activation shows up as black
 * rather than as some arbitrary color; ±Infinity clamp like any other value.
 */
export function clampUnit(v: number): number {
  if (Number.isNaN(v)) return 0;
  return v < 0 ? 0 : v > 1 ? 1 : v;
}

/**
 * Computes one cell's next value into `out` (length >= 3) and returns how
 * many of its channel activations were non-finite.
 *
 * For each channel c: sum over dx, dy in -1..1 of
 * src(x + dx, y + dy)[c] * kernel_c[(dx + 1) * 3 + (dy + 1)], with both
 * coordinates wrapped, then out[c] = clamp(activation_c(sum)).
 */
function computeInto(
  cells: Readonly<Float32Array>,
  width: number,
  height: number,
  x: number,
  y: number,
  kernels: ChannelTriple<Float64Array>,
  activations: ChannelTriple<Activation>,
  out: Float64Array,
): number {
  const xs0 = x === 0 ? width - 1 : x - 1;
  const xs2 = x === width - 1 ? 0 : x + 1;
  const ys0 = y === 0 ? height - 1 : y - 1;
  const ys2 = y === height - 1 ? 0 : y + 1;
  const xs = [xs0, x, xs2];
  const rows = [ys0 * width, y * width, ys2 * width];

  let red = 0, green = 0, blue = 0;
  for (let i = 0; i < 3; i++) {
    for (let j = 0; j < 3; j++) {
      const n = (rows[j] + xs[i]) * CELL_STRIDE;
      const k = i * 3 + j;
      red += cells[n] * kernels[0][k];
      green += cells[n + 1] * kernels[1][k];
      blue += cells[n + 2] * kernels[2][k];
    }
  }

  let nonFinite = 0;
  const sums = [red, green, blue];
  for (let c = 0; c < 3; c++) {
    const activated = activations[c](sums[c]);
    if (!Number.isFinite(activated)) nonFinite++;
    out[c] = clampUnit(activated);
  }
  return nonFinite;
}

/**
 * The update rule for a single cell, as a pure function of its coordinates,
 * the source grid and the per-channel parameters.
 */
export function computeCell(
  src: IGrid,
  x: number,
  y: number,
  filters: ChannelTriple<Filter>,
  activations: ChannelTriple<Activation>,
): Cell {
  const out = new Float64Array(3);
  const kernels: ChannelTriple<Float64Array> = [toKernel(filters[0]), toKernel(filters[1]), toKernel(filters[2])];
  computeInto(src.cells, src.width, src.height, x, y, kernels, activations, out);
  return [out[0], out[1], out[2], 1];
}

/**
 * Applies the update rule to every cell of `src`, writing into `dst`.
 *
 * `src` is only read and `dst` only written, so every cell sees the settled
 * previous state. The two must be different grids of the same size. Filters
 * are copied into kernels once up front, so one step uses one set of
 * coefficients throughout. Cells are visited tile by tile.
 */
export function step(
  src: IGrid,
  dst: Grid,
  filters: ChannelTriple<Filter>,
  activations: ChannelTriple<Activation>,
): StepResult {
  const { width, height } = src;
  if (dst.width !== width || dst.height !== height) {
    throw new GridDimensionError(
      `Source is ${width}x${height} but destination is ${dst.width}x${dst.height}`);
  }
  if (src.cells === dst.cells) {
    throw new GridDimensionError("Source and destination must be different grids");
  }
  if (width === 0 || height === 0) return { nonFiniteCount: 0 };

  const kernels: ChannelTriple<Float64Array> = [toKernel(filters[0]), toKernel(filters[1]), toKernel(filters[2])];
  const srcCells = src.cells;
  const dstCells = dst.cells;
  const out = new Float64Array(3);
  let nonFiniteCount = 0;

  for (let ty = 0; ty < height; ty += TILE_SIZE) {
    const yEnd = Math.min(ty + TILE_SIZE, height);
    for (let tx = 0; tx < width; tx += TILE_SIZE) {
      const xEnd = Math.min(tx + TILE_SIZE, width);
      for (let y = ty; y < yEnd; y++) {
        for (let x = tx; x < xEnd; x++) {
          nonFiniteCount += computeInto(srcCells, width, height, x, y, kernels, activations, out);
          const i = (y * width + x) * CELL_STRIDE;
          dstCells[i] = out[0];
          dstCells[i + 1] = out[1];
          dstCells[i + 2] = out[2];
          dstCells[i + 3] = 1;
        }
      }
    }
  }

  return { nonFiniteCount };
}
