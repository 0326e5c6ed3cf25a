// Generator
export { Random } from './random/index.js';
export { scramble, advance, seedToBigInt, isValidState, polarPair } from './random/index.js';
export type { GaussianPair } from './random/index.js';

// Types, constants and errors
export type { Seed, RandomState } from './types.js';
export { MULTIPLIER, ADDEND, STATE_BITS, STATE_MASK, FLOAT_DIVISOR, DOUBLE_DIVISOR } from './constants.js';
export { RandomError, InvalidArgumentError } from './errors.js';

// Utilities
export { toInt32, toUint32, isPowerOfTwo, toInt64, toUint64 } from './utils/int32.js';
export { log as strictLog } from './utils/fdlibm.js';

// Compat API
export { JavaRandom } from './compat/index.js';
