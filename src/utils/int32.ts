export function toInt32(value: number): number {
  return value | 0;
}

export function toUint32(value: number): number {
  return value >>> 0;
}

/** Power-of-two test on the 32-bit two's-complement view, i.e. (n & -n) === n. */
export function isPowerOfTwo(value: number): boolean {
  const v = value | 0;
  return v > 0 && (v & -v) === v;
}

export function toInt64(value: bigint): bigint {
  return BigInt.asIntN(64, value);
}

export function toUint64(value: bigint): bigint {
  return BigInt.asUintN(64, value);
}
