import { CELL_STRIDE } from "../constants";
import { clampUnit } from "../simulation/convolution";
import type { RGB } from "../simulation/grid";
import type { IGrid } from "../types/grid-types";

/** Maps a channel value in [0, 1] to a byte. Out-of-range values clamp; NaN is 0. */
export function unitToByte(v: number): number {
  return Math.round(clampUnit(v) * 255);
}

/**
 * Writes the grid as 8-bit RGBA, row-major with a top-left origin, the same
 * layout the grid uses. `out` must hold width * height * 4 bytes.
 */
export function gridToRGBA8(grid: IGrid, out: Uint8Array): Uint8Array {
  const { cells } = grid;
  if (out.length !== cells.length) {
    throw new RangeError(`Expected a ${cells.length}-byte buffer, got ${out.length}`);
  }
  for (let i = 0; i < cells.length; i += CELL_STRIDE) {
    out[i] = unitToByte(cells[i]);
    out[i + 1] = unitToByte(cells[i + 1]);
    out[i + 2] = unitToByte(cells[i + 2]);
    out[i + 3] = unitToByte(cells[i + 3]);
  }
  return out;
}

/** Convert [r, g, b] in 0..1 to a CSS hex color string. */
export function rgbToHex(color: RGB): string {
  return "#" + color.map((c) => unitToByte(c).toString(16).padStart(2, "0")).join("");
}

/** Parse a "#rrggbb" CSS color into [r, g, b] in 0..1. Returns null for anything else. */
export function hexToRgb(hex: string): RGB | null {
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex.trim());
  if (!match) return null;
  return [
    parseInt(match[1], 16) / 255,
    parseInt(match[2], 16) / 255,
    parseInt(match[3], 16) / 255,
  ];
}
