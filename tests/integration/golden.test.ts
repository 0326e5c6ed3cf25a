import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Random } from '../../src/random/index.js';
import { JavaRandom } from '../../src/compat/index.js';

interface Vector<T> {
  seed: string;
  bound?: number;
  values: T[];
}

interface GoldenVectors {
  nextBytes: Vector<number>;
  nextU32: Vector<number>;
  nextU64: Vector<string>;
  nextU32Bound65536: Vector<number>;
  nextU32Bound999999999: Vector<number>;
  nextBool: Vector<boolean>;
  nextF32: Vector<string>;
  nextF64: Vector<string>;
  nextGaussian: Vector<string>;
  javaNextLong: Vector<string>;
}

const golden: GoldenVectors = JSON.parse(
  readFileSync(fileURLToPath(new URL('../fixtures/golden-vectors.json', import.meta.url)), 'utf-8'),
);

function float32Hex(value: number): string {
  const view = new DataView(new ArrayBuffer(4));
  view.setFloat32(0, value);
  return '0x' + view.getUint32(0).toString(16).padStart(8, '0');
}

function float64Hex(value: number): string {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return '0x' + view.getBigUint64(0).toString(16).padStart(16, '0');
}

function draw<T>(vector: Vector<unknown>, fn: (random: Random) => T): T[] {
  const random = new Random(BigInt(vector.seed));
  return vector.values.map(() => fn(random));
}

describe('golden vectors', () => {
  it('nextBytes', () => {
    const { seed, values } = golden.nextBytes;
    const bytes = new Random(BigInt(seed)).nextBytes(new Uint8Array(values.length));
    expect(Array.from(bytes)).toEqual(values);
  });

  it('nextU32', () => {
    expect(draw(golden.nextU32, r => r.nextU32())).toEqual(golden.nextU32.values);
  });

  it('nextU64', () => {
    expect(draw(golden.nextU64, r => r.nextU64().toString())).toEqual(golden.nextU64.values);
  });

  it('nextU32Bound(65536)', () => {
    const vector = golden.nextU32Bound65536;
    expect(draw(vector, r => r.nextU32Bound(65536))).toEqual(vector.values);
  });

  it('nextU32Bound(999999999)', () => {
    const vector = golden.nextU32Bound999999999;
    expect(draw(vector, r => r.nextU32Bound(999999999))).toEqual(vector.values);
  });

  it('nextBool', () => {
    expect(draw(golden.nextBool, r => r.nextBool())).toEqual(golden.nextBool.values);
  });

  it('nextF32 bit patterns', () => {
    expect(draw(golden.nextF32, r => float32Hex(r.nextF32()))).toEqual(golden.nextF32.values);
  });

  it('nextF64 bit patterns', () => {
    expect(draw(golden.nextF64, r => float64Hex(r.nextF64()))).toEqual(golden.nextF64.values);
  });

  it('nextGaussian bit patterns', () => {
    expect(draw(golden.nextGaussian, r => float64Hex(r.nextGaussian()))).toEqual(golden.nextGaussian.values);
  });

  it('JavaRandom.nextLong', () => {
    const { seed, values } = golden.javaNextLong;
    const java = new JavaRandom(BigInt(seed));
    expect(values.map(() => java.nextLong().toString())).toEqual(values);
  });
});
