import { STATE_BITS, FLOAT_DIVISOR, DOUBLE_DIVISOR } from '../constants.js';
import { InvalidArgumentError } from '../errors.js';
import { type Seed, type RandomState } from '../types.js';
import { toInt32, toUint32, isPowerOfTwo, toInt64, toUint64 } from '../utils/int32.js';
import { scramble, advance, isValidState } from './state.js';
import { polarPair } from './gaussian.js';

const INT32_MAX = 0x7fffffff;
const UINT32_MAX = 0xffffffff;
const TWO_POW_31 = 0x80000000;

export class Random {
  private state: bigint;
  private pendingGaussian: number | null;

  constructor(seed: Seed) {
    this.state = scramble(seed);
    this.pendingGaussian = null;
  }

  /** Rebuild a generator from a raw snapshot; the state is used as-is, not scrambled. */
  static fromState(snapshot: RandomState): Random {
    if (!isValidState(snapshot.state)) {
      throw new InvalidArgumentError('state', snapshot.state, 'must be in [0, 2^48)');
    }
    const random = new Random(0);
    random.state = snapshot.state;
    random.pendingGaussian = snapshot.pendingGaussian;
    return random;
  }

  /** Equivalent to replacing this generator with `new Random(seed)`. */
  setSeed(seed: Seed): void {
    this.state = scramble(seed);
    this.pendingGaussian = null;
  }

  getState(): RandomState {
    return {
      state: this.state,
      pendingGaussian: this.pendingGaussian,
    };
  }

  clone(): Random {
    return Random.fromState(this.getState());
  }

  /**
   * Step the LCG and return the top `bits` bits of the new 48-bit state.
   * Throws before touching the state when `bits` is not an integer in [0, 48].
   */
  next(bits: number): number {
    if (!Number.isInteger(bits) || bits < 0 || bits > STATE_BITS) {
      throw new InvalidArgumentError('bits', bits, `must be an integer in [0, ${STATE_BITS}]`);
    }
    this.state = advance(this.state);
    return Number(this.state >> BigInt(STATE_BITS - bits));
  }

  /** Fill `buffer` from successive 32-bit draws, low byte first. The last draw's unused high bytes are dropped. */
  nextBytes(buffer: Uint8Array): Uint8Array {
    for (let i = 0; i < buffer.length;) {
      let block = this.nextU32();
      const n = Math.min(buffer.length - i, 4);
      for (let b = 0; b < n; b++) {
        buffer[i++] = block & 0xff;
        block >>>= 8;
      }
    }
    return buffer;
  }

  nextI32(): number {
    return toInt32(this.next(32));
  }

  nextU32(): number {
    return toUint32(this.next(32));
  }

  /**
   * Uniform integer in [0, max) for 0 < max < 2^31.
   *
   * Powers of two scale a 31-bit draw. Everything else takes `bits % max` and
   * redraws while `bits - val + (max - 1)` overflows int32, which discards the
   * incomplete last bucket of the 31-bit range.
   */
  nextI32Bound(max: number): number {
    if (!Number.isInteger(max) || max <= 0 || max > INT32_MAX) {
      throw new InvalidArgumentError('max', max, 'must be a positive 32-bit integer');
    }

    if (isPowerOfTwo(max)) {
      // max * 2^31 stays an exact double, so this is the 64-bit (max * bits) >> 31.
      return Math.floor((max * this.next(31)) / TWO_POW_31);
    }

    let bits = this.next(31);
    let val = bits % max;
    while (toInt32(bits - val + (max - 1)) < 0) {
      bits = this.next(31);
      val = bits % max;
    }
    return val;
  }

  /** `max` is reinterpreted as int32, so bounds of 2^31 and above fail like a negative bound. */
  nextU32Bound(max: number): number {
    if (!Number.isInteger(max) || max < 0 || max > UINT32_MAX) {
      throw new InvalidArgumentError('max', max, 'must be an unsigned 32-bit integer');
    }
    return toUint32(this.nextI32Bound(toInt32(max)));
  }

  /** Two 32-bit draws, high word first, concatenated with 64-bit wraparound. */
  nextU64(): bigint {
    const high = BigInt(this.next(32)) << 32n;
    const low = BigInt(this.next(32));
    return toUint64(high + low);
  }

  nextI64(): bigint {
    return toInt64(this.nextU64());
  }

  nextBool(): boolean {
    return this.next(1) === 1;
  }

  /** 24-bit draw scaled into [0, 1); the result is exactly representable as a float32. */
  nextF32(): number {
    return Math.fround(Math.fround(this.next(24)) / FLOAT_DIVISOR);
  }

  /** 53-bit double in [0, 1) built from a 26-bit draw followed by a 27-bit draw. */
  nextF64(): number {
    const high = this.next(26) * 2 ** 27;
    const low = this.next(27);
    return (high + low) / DOUBLE_DIVISOR;
  }

  /**
   * Standard normal deviate. Deviates come in pairs: the first call of a pair
   * runs the polar method and caches the second value, the next call returns
   * the cached value without drawing.
   */
  nextGaussian(): number {
    if (this.pendingGaussian !== null) {
      const cached = this.pendingGaussian;
      this.pendingGaussian = null;
      return cached;
    }

    const [first, second] = polarPair(() => this.nextF64());
    this.pendingGaussian = second;
    return first;
  }
}

export { scramble, advance, seedToBigInt, isValidState } from './state.js';
export { polarPair, type GaussianPair } from './gaussian.js';
