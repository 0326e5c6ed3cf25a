import { MULTIPLIER, ADDEND, STATE_MASK } from '../constants.js';
import { InvalidArgumentError } from '../errors.js';
import { type Seed } from '../types.js';

export function seedToBigInt(seed: Seed): bigint {
  if (typeof seed === 'number') {
    if (!Number.isSafeInteger(seed)) {
      throw new InvalidArgumentError('seed', seed, 'must be a safe integer or a bigint');
    }
    return BigInt.asUintN(64, BigInt(seed));
  }
  return BigInt.asUintN(64, seed);
}

/** Initial state for a seed: (seed ^ multiplier) & (2^48 - 1). */
export function scramble(seed: Seed): bigint {
  return (seedToBigInt(seed) ^ MULTIPLIER) & STATE_MASK;
}

/**
 * One LCG step: state * 0x5DEECE66D + 11 (mod 2^48).
 * bigint arithmetic never overflows, so masking afterwards gives the same
 * low 48 bits as wrapping 64-bit arithmetic would.
 */
export function advance(state: bigint): bigint {
  return (state * MULTIPLIER + ADDEND) & STATE_MASK;
}

export function isValidState(state: bigint): boolean {
  return state >= 0n && state <= STATE_MASK;
}
