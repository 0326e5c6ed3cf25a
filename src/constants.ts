/** LCG multiplier; also XORed into the seed when scrambling it. */
export const MULTIPLIER = 0x5DEECE66Dn;
export const ADDEND = 0xBn;

export const STATE_BITS = 48;
export const STATE_MASK = (1n << 48n) - 1n;

export const FLOAT_DIVISOR = Math.fround(1 << 24);
export const DOUBLE_DIVISOR = 2 ** 53;
