import { Random } from '../random/index.js';
import { type Seed } from '../types.js';
import { toInt64 } from '../utils/int32.js';

/**
 * java.util.Random surface over {@link Random}, for code ported from Java.
 *
 * Method names and overloads follow the Java class. The one behavioral
 * difference from the native API is `nextLong()`, which adds the low word
 * sign-extended as Java does (`((long) next(32) << 32) + next(32)` with
 * `next` returning an int); `Random.nextI64()` concatenates the two words.
 */
export class JavaRandom {
  private readonly random: Random;

  constructor(seed: Seed) {
    this.random = new Random(seed);
  }

  setSeed(seed: Seed): void {
    this.random.setSeed(seed);
  }

  nextInt(bound?: number): number {
    return bound === undefined ? this.random.nextI32() : this.random.nextI32Bound(bound);
  }

  nextLong(): bigint {
    const high = BigInt(this.random.nextI32()) << 32n;
    const low = BigInt(this.random.nextI32());
    return toInt64(high + low);
  }

  nextBoolean(): boolean {
    return this.random.nextBool();
  }

  nextFloat(): number {
    return this.random.nextF32();
  }

  nextDouble(): number {
    return this.random.nextF64();
  }

  nextGaussian(): number {
    return this.random.nextGaussian();
  }

  /** Fills a Java-style signed byte array; same bits as `Random.nextBytes`. */
  nextBytes(bytes: Int8Array): void {
    this.random.nextBytes(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  }

  unwrap(): Random {
    return this.random;
  }
}
