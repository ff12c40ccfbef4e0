import { IndexOutOfBoundsError } from "../errors";

export function checkCount(count: number) {
  if (!(Number.isSafeInteger(count) && count >= 0)) {
    throw new Error(`Invalid count: ${count}`);
  }
}

export function checkPhysicalIndex(index: number, length: number) {
  if (!(Number.isSafeInteger(index) && 0 <= index && index < length)) {
    throw new IndexOutOfBoundsError(index, length);
  }
}

/**
 * The number of items `iterable` will yield, if it is cheap to know, else 0.
 * Never more than the true count.
 */
export function sizeHint(iterable: Iterable<unknown>): number {
  if (Array.isArray(iterable)) return iterable.length;
  if (iterable instanceof Set || iterable instanceof Map) return iterable.size;
  return 0;
}
