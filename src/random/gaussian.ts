import { log } from '../utils/fdlibm.js';

export type GaussianPair = [first: number, second: number];

/**
 * Polar Box-Muller: draw (x, y) uniformly from the square [-1, 1)^2 until it
 * falls strictly inside the unit circle and off the origin, then scale both
 * coordinates by sqrt(-2 ln(s) / s). Each candidate consumes two doubles.
 */
export function polarPair(nextDouble: () => number): GaussianPair {
  let x: number;
  let y: number;
  let s: number;
  do {
    x = 2 * nextDouble() - 1;
    y = 2 * nextDouble() - 1;
    s = x * x + y * y;
  } while (s >= 1 || s === 0);

  const multiplier = Math.sqrt(-2 * log(s) / s);
  return [x * multiplier, y * multiplier];
}
