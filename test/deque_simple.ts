// Simpler implementation of LinkedVec, used for fuzz testing.

/**
 * A double-ended queue that reproduces LinkedVec's physical layout without links:
 * `slots` is the dense physical array, and `order` lists physical indices in
 * logical order. Every operation is O(n).
 */
export class DequeSimple<T> {
  private readonly slots: T[] = [];
  private readonly order: number[] = [];

  /**
   * @param maxLength The most elements the list may hold.
   */
  constructor(readonly maxLength: number) {}

  get length(): number {
    return this.slots.length;
  }

  getP(p: number): T {
    this.checkIndex(p);
    return this.slots[p];
  }

  setP(p: number, value: T): void {
    this.checkIndex(p);
    this.slots[p] = value;
  }

  front(): T | undefined {
    return this.order.length === 0 ? undefined : this.slots[this.order[0]];
  }

  back(): T | undefined {
    return this.order.length === 0
      ? undefined
      : this.slots[this.order[this.order.length - 1]];
  }

  pushFront(value: T): void {
    this.order.unshift(this.pushSlot(value));
  }

  pushBack(value: T): void {
    this.order.push(this.pushSlot(value));
  }

  popFront(): T | undefined {
    if (this.order.length === 0) return undefined;
    return this.swapRemove(this.order[0]);
  }

  popBack(): T | undefined {
    if (this.order.length === 0) return undefined;
    return this.swapRemove(this.order[this.order.length - 1]);
  }

  pop(): T | undefined {
    if (this.slots.length === 0) return undefined;
    return this.swapRemove(this.slots.length - 1);
  }

  swapRemove(p: number): T {
    this.checkIndex(p);
    const removed = this.slots[p];
    this.order.splice(this.order.indexOf(p), 1);

    const last = this.slots.length - 1;
    if (p !== last) {
      this.slots[p] = this.slots[last];
      this.order[this.order.indexOf(last)] = p;
    }
    this.slots.pop();
    return removed;
  }

  swapP(a: number, b: number): void {
    this.checkIndex(a);
    this.checkIndex(b);
    const tmp = this.slots[a];
    this.slots[a] = this.slots[b];
    this.slots[b] = tmp;
  }

  clear(): void {
    this.slots.length = 0;
    this.order.length = 0;
  }

  extend(values: Iterable<T>): void {
    for (const value of values) this.pushBack(value);
  }

  values(): T[] {
    return this.order.map((p) => this.slots[p]);
  }

  indicesP(): number[] {
    return this.order.slice();
  }

  entries(): [number, T][] {
    return this.order.map((p) => [p, this.slots[p]]);
  }

  private pushSlot(value: T): number {
    if (this.slots.length >= this.maxLength) {
      throw new Error("capacity overflow");
    }
    this.slots.push(value);
    return this.slots.length - 1;
  }

  private checkIndex(p: number): void {
    if (!(Number.isInteger(p) && 0 <= p && p < this.slots.length)) {
      throw new Error(
        `Index out of bounds: ${p} (length: ${this.slots.length})`
      );
    }
  }
}
