/** A seed is reinterpreted as a 64-bit value, so -1 and 2^64 - 1 are the same seed. */
export type Seed = number | bigint;

export interface RandomState {
  /** Raw 48-bit LCG state, already scrambled. */
  state: bigint;
  pendingGaussian: number | null;
}
