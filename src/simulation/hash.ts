/* eslint-disable no-bitwise */
import { HASH_MULTIPLIER, HASH_SEED_XOR, UINT32_MAX } from "../constants";

/**
 * 32-bit integer avalanche hash: an xor with a fixed seed followed by three
 * multiply rounds interleaved with xor-shifts. All arithmetic wraps at 2^32.
 */
export function hash32(value: number): number {
  let state = value >>> 0;
  state = (state ^ HASH_SEED_XOR) >>> 0;
  state = Math.imul(state, HASH_MULTIPLIER) >>> 0;
  state = (state ^ (state >>> 16)) >>> 0;
  state = Math.imul(state, HASH_MULTIPLIER) >>> 0;
  state = (state ^ (state >>> 16)) >>> 0;
  state = Math.imul(state, HASH_MULTIPLIER) >>> 0;
  return state;
}

/** Maps hash32(value) into [0, 1]. */
export function randomFloat(value: number): number {
  return hash32(value) / UINT32_MAX;
}
/* eslint-enable no-bitwise */
