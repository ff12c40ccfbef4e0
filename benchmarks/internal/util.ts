import { LinkedVec, NonMaxU16, NonMaxU32, U32, Usize } from "../../src";

export function msSince(startTime: bigint): number {
  return Math.round(
    new Number(process.hrtime.bigint() - startTime).valueOf() / 1000000
  );
}

export async function sleep(ms: number) {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Index types worth comparing. NonMaxU16 caps lists at 65535 elements,
 * so workloads stay below that.
 */
export const variants = [
  { name: "Usize", make: () => LinkedVec.withIndex<number, number>(Usize) },
  { name: "U32", make: () => LinkedVec.withIndex<number, number>(U32) },
  { name: "NonMaxU32", make: () => LinkedVec.withIndex<number, number>(NonMaxU32) },
  { name: "NonMaxU16", make: () => LinkedVec.withIndex<number, number>(NonMaxU16) },
];
