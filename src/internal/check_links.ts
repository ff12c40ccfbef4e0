import { SparseIndices } from "sparse-array-rled";
import type { LinkedVec } from "../linked_vec";
import type { IndexRepr } from "../store_index";

/**
 * Walks `list` from head to tail and throws if any structural invariant is broken:
 * - head and tail are absent exactly when the list is empty;
 * - every stored link is a valid physical index;
 * - each slot's prev link points back at the slot that linked to it;
 * - the chain visits every slot exactly once and ends at tail;
 * - the list is no longer than its index type can address.
 */
export function checkLinks<T, I extends IndexRepr>(list: LinkedVec<T, I>): void {
  const length = list.length;
  const head = list.headP;
  const tail = list.tailP;

  if (length > list.index.maxPosition + 1) {
    throw new Error(
      `Length ${length} exceeds what ${list.index.name} can address`
    );
  }
  if (length === 0) {
    if (head !== undefined || tail !== undefined) {
      throw new Error("Empty list has a head or tail");
    }
    return;
  }
  if (head === undefined || tail === undefined) {
    throw new Error("Non-empty list is missing its head or tail");
  }
  if (head >= length || tail >= length) {
    throw new Error(`Head ${head} or tail ${tail} out of bounds (length: ${length})`);
  }

  const visited = SparseIndices.new();
  let prev: number | undefined = undefined;
  let current: number | undefined = head;
  let last = head;
  while (current !== undefined) {
    if (visited.has(current)) {
      throw new Error(`Slot ${current} is visited twice`);
    }
    visited.set(current);

    const back = list.prevP(current);
    if (back !== prev) {
      throw new Error(
        `Slot ${current} has prev ${back}, but is linked from ${prev}`
      );
    }

    const next = list.nextP(current);
    if (next !== undefined && next >= length) {
      throw new Error(`Slot ${current} links to ${next} (length: ${length})`);
    }
    prev = current;
    last = current;
    current = next;
  }

  if (last !== tail) {
    throw new Error(`Chain ends at slot ${last}, but tail is ${tail}`);
  }
  if (visited.count() !== length) {
    throw new Error(`Chain visits ${visited.count()} of ${length} slots`);
  }
}
