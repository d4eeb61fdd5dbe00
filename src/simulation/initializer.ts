import { CELL_STRIDE, TILE_SIZE } from "../constants";
import type { ChannelTriple } from "./channels";
import type { Grid } from "./grid";
import { randomFloat } from "./hash";

/**
 * Hash inputs for the red, green and blue values of cell (x, y).
 *
 * The flat index is offset by 0, 1 and 2 whole grid areas so the three
 * channels never draw from the same input.
 */
export function seedInputs(x: number, y: number, width: number, height: number): ChannelTriple<number> {
  const flat = y * width + x;
  const area = width * height;
  return [flat, area + flat, 2 * area + flat];
}

/**
 * Fills every cell with reproducible pseudo-random channel values in [0, 1]
 * and alpha 1. The result depends only on the grid size and cell coordinates.
 */
export function seedGrid(grid: Grid): void {
  const { width, height, cells } = grid;
  for (let ty = 0; ty < height; ty += TILE_SIZE) {
    const yEnd = Math.min(ty + TILE_SIZE, height);
    for (let tx = 0; tx < width; tx += TILE_SIZE) {
      const xEnd = Math.min(tx + TILE_SIZE, width);
      for (let y = ty; y < yEnd; y++) {
        for (let x = tx; x < xEnd; x++) {
          const [red, green, blue] = seedInputs(x, y, width, height);
          const i = (y * width + x) * CELL_STRIDE;
          cells[i] = randomFloat(red);
          cells[i + 1] = randomFloat(green);
          cells[i + 2] = randomFloat(blue);
          cells[i + 3] = 1;
        }
      }
    }
  }
}
