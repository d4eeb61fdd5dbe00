/** One row of a 3x3 filter. */
export type FilterRow = readonly [number, number, number];

/**
 * A 3x3 convolution kernel. filter[dx + 1][dy + 1] weighs the neighbor at
 * horizontal offset dx and vertical offset dy (each in -1..1).
 */
export type Filter = readonly [FilterRow, FilterRow, FilterRow];

/** Number of coefficients in a flattened filter. */
export const FILTER_SIZE = 9;

export const IDENTITY_FILTER: Filter = [
  [0, 0, 0],
  [0, 1, 0],
  [0, 0, 0],
];

export const ZERO_FILTER: Filter = [
  [0, 0, 0],
  [0, 0, 0],
  [0, 0, 0],
];

/** Index into a flattened filter for neighbor offset (dx, dy). */
export function filterIndex(dx: number, dy: number): number {
  if (!isOffset(dx) || !isOffset(dy)) {
    throw new RangeError(`Filter offsets must be -1, 0 or 1, got (${dx}, ${dy})`);
  }
  return (dx + 1) * 3 + (dy + 1);
}

function isOffset(v: number): boolean {
  return v === -1 || v === 0 || v === 1;
}

/** Builds a filter from nine coefficients in filterIndex() order. */
export function filterFromArray(values: readonly number[]): Filter {
  if (values.length !== FILTER_SIZE) {
    throw new RangeError(`A filter needs ${FILTER_SIZE} coefficients, got ${values.length}`);
  }
  return [
    [values[0], values[1], values[2]],
    [values[3], values[4], values[5]],
    [values[6], values[7], values[8]],
  ];
}

export function filterToArray(filter: Filter): number[] {
  return [...filter[0], ...filter[1], ...filter[2]];
}

/** Copies a filter's coefficients into a flat kernel for the step's inner loop. */
export function toKernel(filter: Filter): Float64Array {
  return Float64Array.from(filterToArray(filter));
}

/** Returns a copy of `values` with the coefficient for (dx, dy) replaced. */
export function withCoefficient(values: readonly number[], dx: number, dy: number, value: number): number[] {
  const next = [...values];
  next[filterIndex(dx, dy)] = value;
  return next;
}
