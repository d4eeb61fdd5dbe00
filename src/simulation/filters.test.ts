import {
  FILTER_SIZE, IDENTITY_FILTER, filterFromArray, filterIndex, filterToArray, toKernel, withCoefficient,
} from "./filters";

describe("filterIndex", () => {
  it("orders coefficients by horizontal offset, then vertical", () => {
    expect(filterIndex(-1, -1)).toBe(0);
    expect(filterIndex(-1, 0)).toBe(1);
    expect(filterIndex(0, -1)).toBe(3);
    expect(filterIndex(0, 0)).toBe(4);
    expect(filterIndex(1, 1)).toBe(8);
  });

  it("rejects offsets outside -1..1", () => {
    expect(() => filterIndex(2, 0)).toThrow(RangeError);
    expect(() => filterIndex(0, 0.5)).toThrow(RangeError);
  });
});

describe("filter arrays", () => {
  it("round-trips nine coefficients", () => {
    const values = [1, 2, 3, 4, 5, 6, 7, 8, 9];
    const filter = filterFromArray(values);
    expect(filter[0]).toEqual([1, 2, 3]);
    expect(filter[2][1]).toBe(8);
    expect(filterToArray(filter)).toEqual(values);
  });

  it("puts the identity's only weight on the center", () => {
    const flat = filterToArray(IDENTITY_FILTER);
    expect(flat.length).toBe(FILTER_SIZE);
    expect(flat[filterIndex(0, 0)]).toBe(1);
    expect(flat.reduce((a, b) => a + b, 0)).toBe(1);
  });

  it("rejects the wrong number of coefficients", () => {
    expect(() => filterFromArray([1, 2, 3])).toThrow("A filter needs 9 coefficients, got 3");
  });

  it("withCoefficient replaces one entry without touching the input", () => {
    const values = filterToArray(IDENTITY_FILTER);
    const next = withCoefficient(values, 1, -1, 0.5);
    expect(next[6]).toBe(0.5);
    expect(values[6]).toBe(0);
  });

  it("toKernel copies the coefficients into a flat array", () => {
    const kernel = toKernel(IDENTITY_FILTER);
    expect(kernel).toBeInstanceOf(Float64Array);
    expect(Array.from(kernel)).toEqual([0, 0, 0, 0, 1, 0, 0, 0, 0]);
  });
});
