import { Random, InvalidArgumentError } from '../src/index.js';

// Usage: dump-sequence.ts [seed] [count]
const [seedArg = '0', countArg = '10'] = process.argv.slice(2);

let random: Random;
try {
  random = new Random(BigInt(seedArg));
} catch (err) {
  if (err instanceof SyntaxError || err instanceof InvalidArgumentError) {
    console.error(`Invalid seed: ${seedArg}`);
    process.exit(1);
  }
  throw err;
}

const count = Number.parseInt(countArg, 10);
if (!Number.isInteger(count) || count < 0) {
  console.error(`Invalid count: ${countArg}`);
  process.exit(1);
}

for (let i = 0; i < count; i++) {
  console.log(`${i}\t${random.nextU32()}`);
}
