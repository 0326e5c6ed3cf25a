import { Random } from '../src/index.js';

const random = new Random(42);

console.log(`nextI32:         ${random.nextI32()}`);
console.log(`nextI32Bound(6): ${random.nextI32Bound(6)}`);
console.log(`nextU64:         ${random.nextU64()}`);
console.log(`nextBool:        ${random.nextBool()}`);
console.log(`nextF32:         ${random.nextF32()}`);
console.log(`nextF64:         ${random.nextF64()}`);
console.log(`nextGaussian:    ${random.nextGaussian()}`);
console.log(`nextGaussian:    ${random.nextGaussian()}`);

const bytes = random.nextBytes(new Uint8Array(8));
console.log(`nextBytes:       ${Array.from(bytes, b => b.toString(16).padStart(2, '0')).join(' ')}`);

// Snapshot and resume
const snapshot = random.getState();
const resumed = Random.fromState(snapshot);
console.log(`resumed matches: ${resumed.nextI32() === random.nextI32()}`);
