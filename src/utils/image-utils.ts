import type { IGrid } from "../types/grid-types";
import { unitToByte } from "./color-utils";

/** Encodes the grid's color channels as a binary PPM (P6) image, top row first. */
export function encodePPM(grid: IGrid): Uint8Array {
  const header = new TextEncoder().encode(`P6\n${grid.width} ${grid.height}\n255\n`);
  const pixels = grid.width * grid.height;
  const out = new Uint8Array(header.length + pixels * 3);
  out.set(header, 0);
  let o = header.length;
  for (let p = 0; p < pixels; p++) {
    const i = p * 4;
    out[o++] = unitToByte(grid.cells[i]);
    out[o++] = unitToByte(grid.cells[i + 1]);
    out[o++] = unitToByte(grid.cells[i + 2]);
  }
  return out;
}
