import { BorrowError } from "./errors";
import type { LinkedVec } from "./linked_vec";
import { PayloadRef, SlotRef } from "./payload_ref";
import type { IndexRepr } from "./store_index";

/**
 * An iterator that can also be advanced from the back.
 *
 * `next` and `nextBack` share one pool of `remaining` items: once the two ends
 * meet, both report done.
 */
export interface DoubleEndedIterator<Item> extends IterableIterator<Item> {
  nextBack(): IteratorResult<Item>;
  /**
   * The exact number of items left.
   */
  readonly remaining: number;
  /**
   * Returns an iterator over the remaining items in reverse order.
   * It shares state with this iterator.
   */
  rev(): DoubleEndedIterator<Item>;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Walks the logical chain from both ends: `head` and `tail` are the physical
 * indices of the next items to yield from either side.
 */
abstract class ChainIterator<T, I extends IndexRepr, Item>
  implements DoubleEndedIterator<Item>
{
  protected head: number | undefined;
  protected tail: number | undefined;
  protected len: number;
  protected epoch: number;

  constructor(protected readonly list: LinkedVec<T, I>) {
    this.head = list.headP;
    this.tail = list.tailP;
    this.len = list.length;
    this.epoch = list.epoch;
  }

  protected abstract at(p: number): Item;

  get remaining(): number {
    return this.len;
  }

  next(): IteratorResult<Item> {
    this.check();
    if (this.len === 0) return DONE;
    const p = this.head;
    if (p === undefined) throw new Error("Internal error");
    this.len--;
    if (this.len === 0) {
      this.head = undefined;
      this.tail = undefined;
    } else this.head = this.list.nextP(p);
    return { done: false, value: this.at(p) };
  }

  nextBack(): IteratorResult<Item> {
    this.check();
    if (this.len === 0) return DONE;
    const p = this.tail;
    if (p === undefined) throw new Error("Internal error");
    this.len--;
    if (this.len === 0) {
      this.head = undefined;
      this.tail = undefined;
    } else this.tail = this.list.prevP(p);
    return { done: false, value: this.at(p) };
  }

  rev(): DoubleEndedIterator<Item> {
    return new Rev(this);
  }

  [Symbol.iterator](): this {
    return this;
  }

  protected copyState(source: ChainIterator<T, I, Item>): void {
    this.head = source.head;
    this.tail = source.tail;
    this.len = source.len;
    this.epoch = source.epoch;
  }

  private check(): void {
    if (this.list.epoch !== this.epoch) throw new BorrowError("Iterator");
  }
}

/**
 * Iterates over a list's elements in logical order.
 */
export class Iter<T, I extends IndexRepr> extends ChainIterator<T, I, T> {
  protected at(p: number): T {
    return this.list.getP(p);
  }

  /**
   * Returns an independent iterator at the same state.
   */
  clone(): Iter<T, I> {
    const copy = new Iter(this.list);
    copy.copyState(this);
    return copy;
  }
}

/**
 * Iterates over a list's physical indices in logical order.
 */
export class IterP<T, I extends IndexRepr> extends ChainIterator<T, I, number> {
  protected at(p: number): number {
    return p;
  }

  clone(): IterP<T, I> {
    const copy = new IterP(this.list);
    copy.copyState(this);
    return copy;
  }
}

/**
 * Iterates over mutable handles to a list's elements in logical order.
 *
 * Every handle is created up front, one per slot, and handed out at most once,
 * so no two handles from one traversal address the same slot. All handles stay
 * usable until the list is structurally modified.
 */
export class IterMut<T, I extends IndexRepr> extends ChainIterator<
  T,
  I,
  PayloadRef<T>
> {
  private readonly handles: (PayloadRef<T> | undefined)[];

  constructor(list: LinkedVec<T, I>) {
    super(list);
    this.handles = new Array<PayloadRef<T> | undefined>(list.length);
    for (let p = 0; p < list.length; p++) {
      this.handles[p] = new SlotRef(list, p);
    }
  }

  protected at(p: number): PayloadRef<T> {
    const handle = this.handles[p];
    if (handle === undefined) throw new Error("Internal error");
    this.handles[p] = undefined;
    return handle;
  }
}

/**
 * Consumes a list, yielding its elements by value in logical order.
 * Returned by `LinkedVec.drain()`.
 */
export class IntoIter<T, I extends IndexRepr> implements DoubleEndedIterator<T> {
  /**
   * Internal - use `LinkedVec.drain()`.
   */
  constructor(private readonly list: LinkedVec<T, I>) {}

  get remaining(): number {
    return this.list.length;
  }

  next(): IteratorResult<T> {
    if (this.list.isEmpty()) return DONE;
    const p = this.list.headP;
    if (p === undefined) throw new Error("Internal error");
    return { done: false, value: this.list.swapRemove(p) };
  }

  nextBack(): IteratorResult<T> {
    if (this.list.isEmpty()) return DONE;
    const p = this.list.tailP;
    if (p === undefined) throw new Error("Internal error");
    return { done: false, value: this.list.swapRemove(p) };
  }

  rev(): DoubleEndedIterator<T> {
    return new Rev(this);
  }

  [Symbol.iterator](): this {
    return this;
  }
}

class Rev<Item> implements DoubleEndedIterator<Item> {
  constructor(private readonly inner: DoubleEndedIterator<Item>) {}

  get remaining(): number {
    return this.inner.remaining;
  }

  next(): IteratorResult<Item> {
    return this.inner.nextBack();
  }

  nextBack(): IteratorResult<Item> {
    return this.inner.next();
  }

  rev(): DoubleEndedIterator<Item> {
    return this.inner;
  }

  [Symbol.iterator](): this {
    return this;
  }
}
