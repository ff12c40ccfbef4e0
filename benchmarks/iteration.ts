import seedrandom from "seedrandom";
import { msSince, sleep, variants } from "./internal/util";

const LENGTH = 60000;
const PASSES = 100;

export async function iteration() {
  console.log("\n## Iteration\n");
  console.log(
    `Sum ${LENGTH} elements in logical order, ${PASSES} passes. The list is built from random pushFront/pushBack calls, so logical and physical order differ.\n`
  );

  let expected = 0;
  for (let i = 0; i < LENGTH; i++) expected += i;

  for (const { name, make } of variants) {
    const prng = seedrandom("42");
    const list = make();
    for (let i = 0; i < LENGTH; i++) {
      if (prng() < 0.5) list.pushFront(i);
      else list.pushBack(i);
    }

    const startTime = process.hrtime.bigint();
    for (let pass = 0; pass < PASSES; pass++) {
      let sum = 0;
      for (const value of list) sum += value;
      if (sum !== expected) throw new Error(`Wrong sum: ${sum}`);
    }
    console.log(`- ${name} (ms):`, msSince(startTime));
    await sleep(100);
  }

  const array: number[] = [];
  for (let i = 0; i < LENGTH; i++) array.push(i);
  const startTime = process.hrtime.bigint();
  for (let pass = 0; pass < PASSES; pass++) {
    let sum = 0;
    for (const value of array) sum += value;
    if (sum !== expected) throw new Error(`Wrong sum: ${sum}`);
  }
  console.log("- Array (ms):", msSince(startTime));
}
