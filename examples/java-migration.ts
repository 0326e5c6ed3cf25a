import { JavaRandom } from '../src/index.js';

// Java:
//   Random rnd = new Random(1234L);
//   int[] dice = new int[5];
//   for (int i = 0; i < dice.length; i++) dice[i] = rnd.nextInt(6) + 1;
//   long id = rnd.nextLong();

const rnd = new JavaRandom(1234n);

const dice: number[] = [];
for (let i = 0; i < 5; i++) {
  dice.push(rnd.nextInt(6) + 1);
}
const id = rnd.nextLong();

console.log(`Dice: ${dice.join(', ')}`);
console.log(`Id:   ${id}`);
