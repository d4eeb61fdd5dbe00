import { Grid } from "./grid";
import { hash32, randomFloat } from "./hash";
import { seedGrid, seedInputs } from "./initializer";

describe("hash32", () => {
  it("matches known outputs", () => {
    expect(hash32(0)).toBe(1739749167);
    expect(hash32(1)).toBe(150776505);
    expect(hash32(2)).toBe(1432511529);
    expect(hash32(12345)).toBe(3826328255);
  });

  it("always returns an unsigned 32-bit integer", () => {
    for (const v of [0, 1, 255, 65535, 4294967295, 123456789]) {
      const h = hash32(v);
      expect(Number.isInteger(h)).toBe(true);
      expect(h).toBeGreaterThanOrEqual(0);
      expect(h).toBeLessThanOrEqual(4294967295);
    }
  });
});

describe("randomFloat", () => {
  it("divides the hash by the largest 32-bit value", () => {
    expect(randomFloat(0)).toBeCloseTo(0.4050669184432055, 12);
    expect(randomFloat(1)).toBeCloseTo(0.0351053907152045, 12);
    expect(randomFloat(12345)).toBeCloseTo(0.8908864706500634, 12);
  });
});

describe("seedInputs", () => {
  it("offsets each channel by a whole grid area", () => {
    expect(seedInputs(2, 1, 4, 3)).toEqual([6, 18, 30]);
  });

  it("never gives two channels or two cells the same input", () => {
    const width = 5, height = 4;
    const seen = new Set<number>();
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        for (const input of seedInputs(x, y, width, height)) seen.add(input);
      }
    }
    expect(seen.size).toBe(3 * width * height);
  });
});

describe("seedGrid", () => {
  it("sets each channel from the hash of its input and alpha to 1", () => {
    const grid = new Grid(4, 3);
    seedGrid(grid);
    expect(grid.get(0, 0, 0)).toBeCloseTo(randomFloat(0), 6);
    expect(grid.get(1, 0, 0)).toBeCloseTo(randomFloat(1), 6);
    expect(grid.get(2, 1, 1)).toBeCloseTo(randomFloat(12 + 6), 6);
    expect(grid.get(3, 2, 2)).toBeCloseTo(randomFloat(24 + 11), 6);
    for (let i = 3; i < grid.cells.length; i += 4) {
      expect(grid.cells[i]).toBe(1);
    }
  });

  it("is reproducible and stays within [0, 1]", () => {
    const a = new Grid(19, 11);
    const b = new Grid(19, 11);
    seedGrid(a);
    seedGrid(b);
    expect(Array.from(a.cells)).toEqual(Array.from(b.cells));
    expect(a.cells.every((v) => v >= 0 && v <= 1)).toBe(true);
  });

  it("covers the ragged tiles at the right and bottom edges", () => {
    const grid = new Grid(10, 9);
    seedGrid(grid);
    expect(grid.get(9, 8, 0)).toBeCloseTo(randomFloat(89), 6);
    expect(grid.get(9, 8, 3)).toBe(1);
  });
});
