import seedrandom from "seedrandom";
import { msSince, sleep, variants } from "./internal/util";

const ROUNDS = 200;
const BATCH = 50000;

export async function pushPop() {
  console.log("\n## Push/Pop\n");
  console.log(
    `Fill to ${BATCH} elements alternating pushFront/pushBack, then drain alternating popFront/popBack; ${ROUNDS} rounds.\n`
  );

  for (const { name, make } of variants) {
    const list = make();
    const startTime = process.hrtime.bigint();
    for (let round = 0; round < ROUNDS; round++) {
      for (let i = 0; i < BATCH; i++) {
        if (i % 2 === 0) list.pushFront(i);
        else list.pushBack(i);
      }
      for (let i = 0; i < BATCH; i++) {
        if (i % 2 === 0) list.popFront();
        else list.popBack();
      }
    }
    console.log(`- ${name} (ms):`, msSince(startTime));
    await sleep(100);
  }

  // Array has no O(1) pushFront, so its baseline only uses the back.
  const array: number[] = [];
  const startTime = process.hrtime.bigint();
  for (let round = 0; round < ROUNDS; round++) {
    for (let i = 0; i < BATCH; i++) array.push(i);
    for (let i = 0; i < BATCH; i++) array.pop();
  }
  console.log("- Array, back only (ms):", msSince(startTime));

  console.log("\n## Random swapRemove\n");
  console.log(
    `Fill to ${BATCH} elements, then remove from random physical indices until empty; ${ROUNDS / 10} rounds.\n`
  );

  for (const { name, make } of variants) {
    const prng = seedrandom("42");
    const list = make();
    const startTime = process.hrtime.bigint();
    for (let round = 0; round < ROUNDS / 10; round++) {
      for (let i = 0; i < BATCH; i++) list.pushBack(i);
      while (!list.isEmpty()) {
        list.swapRemove(Math.floor(prng() * list.length));
      }
    }
    console.log(`- ${name} (ms):`, msSince(startTime));
    await sleep(100);
  }
}
