import {
  comparePrimitives,
  Ordering,
  PartialComparator,
  partialCompareSequences,
} from "./compare";
import { VecCursor, VecCursorMut } from "./cursors";
import {
  CapacityOverflowError,
  TryReserveError,
  TryResult,
} from "./errors";
import { checkLinks } from "./internal/check_links";
import { checkCount, checkPhysicalIndex, sizeHint } from "./internal/misc";
import { Entry, NodeStore } from "./internal/node_store";
import { IntoIter, Iter, IterMut, IterP } from "./iterators";
import { PayloadRef, SlotRef } from "./payload_ref";
import { IndexRepr, StoreIndex, Usize } from "./store_index";

/*
 LinkedVec: a doubly linked list whose nodes live in one dense array.

 Each entry has a physical index (its slot in the array) and a place in the logical
 order (the chain of next/prev links, from head to tail). Pushes always append a slot
 at the physical end; removals never leave holes.

 Removing slot p is two separate steps:
 1. Unlink: point p's logical neighbors (or head/tail) at each other. This only
    looks at links, never at where anything sits physically.
 2. Densify: if p was not the last slot, move the last slot's entry into p, then
    repoint the moved entry's neighbors (or head/tail) from its old slot to p.
    This never changes the logical order.

 Links are stored as StoreIndex values, so a list may use narrow integers for them.
 Between the store and the algorithm, links are converted with the unchecked
 conversions: every stored link came from a position < length <= maxPosition + 1.
*/

/**
 * A doubly linked list whose entries live densely in a single array.
 *
 * - `pushFront`/`pushBack`/`popFront`/`popBack`/`pop` are O(1).
 * - Access by physical index (`getP`, `setP`) is O(1).
 * - `swapRemove(p)` removes the element at physical index p in O(1) by moving the
 * physically last entry into its slot.
 *
 * Physical indices are not stable: any removal may move an element to a different slot,
 * so an index captured before a removal may afterwards address a different element,
 * or be out of bounds.
 *
 * Links are stored using the list's {@link StoreIndex} (default {@link Usize}), which also
 * bounds the list's length to `index.maxPosition + 1`.
 *
 * Borrowing discipline: any number of cursors and iterators may read the list at once,
 * but a structural modification (push, pop, remove, clear, append) invalidates all of them;
 * using one afterwards throws {@link BorrowError}. Writing payloads through
 * {@link PayloadRef}s, `setP`, or `swapP` is not structural.
 *
 * If a method throws partway (other than the documented bounds and capacity errors,
 * which are raised before any change), the list's invariants are no longer guaranteed.
 */
export class LinkedVec<T, I extends IndexRepr = number> implements Iterable<T> {
  private store: NodeStore<T, I>;
  private head: I | undefined = undefined;
  private tail: I | undefined = undefined;
  private _epoch = 0;

  /**
   * Internal - construct a LinkedVec using a static method (e.g. `LinkedVec.new`).
   */
  private constructor(readonly index: StoreIndex<I>) {
    this.store = new NodeStore<T, I>(index);
  }

  /**
   * Constructs an empty list whose links are {@link Usize} indices.
   */
  static new<T>(): LinkedVec<T> {
    return new LinkedVec<T>(Usize);
  }

  /**
   * Constructs an empty list whose links use the given index type.
   */
  static withIndex<T, I extends IndexRepr>(
    index: StoreIndex<I>
  ): LinkedVec<T, I> {
    return new LinkedVec<T, I>(index);
  }

  /**
   * Constructs a list holding `values` in order, with {@link Usize} links.
   */
  static from<T>(values: Iterable<T>): LinkedVec<T> {
    const list = LinkedVec.new<T>();
    list.extend(values);
    return list;
  }

  /**
   * Constructs a list holding `values` in order, with links of the given index type.
   *
   * @throws CapacityOverflowError If `values` has more elements than the index type can address.
   */
  static fromWithIndex<T, I extends IndexRepr>(
    index: StoreIndex<I>,
    values: Iterable<T>
  ): LinkedVec<T, I> {
    const list = LinkedVec.withIndex<T, I>(index);
    list.extend(values);
    return list;
  }

  // Accessors

  get length(): number {
    return this.store.length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * The number of entries the link columns can hold without reallocating.
   */
  get capacity(): number {
    return this.store.capacity;
  }

  /**
   * Incremented by every structural modification. Cursors, iterators and
   * PayloadRefs compare against it to detect that they are stale.
   */
  get epoch(): number {
    return this._epoch;
  }

  /**
   * The physical index of the first element, or undefined if empty.
   */
  get headP(): number | undefined {
    return this.position(this.head);
  }

  /**
   * The physical index of the last element, or undefined if empty.
   */
  get tailP(): number | undefined {
    return this.position(this.tail);
  }

  /**
   * Returns the physical index of the element after the one at physical index `p`,
   * or undefined if it is the last element.
   *
   * @throws IndexOutOfBoundsError If `p` is out of bounds.
   */
  nextP(p: number): number | undefined {
    checkPhysicalIndex(p, this.length);
    return this.position(this.store.getNext(p));
  }

  /**
   * Returns the physical index of the element before the one at physical index `p`,
   * or undefined if it is the first element.
   *
   * @throws IndexOutOfBoundsError If `p` is out of bounds.
   */
  prevP(p: number): number | undefined {
    checkPhysicalIndex(p, this.length);
    return this.position(this.store.getPrev(p));
  }

  /**
   * Returns the element at physical index `p`.
   *
   * @throws IndexOutOfBoundsError If `p` is out of bounds.
   */
  getP(p: number): T {
    checkPhysicalIndex(p, this.length);
    return this.store.payload(p);
  }

  /**
   * Replaces the element at physical index `p`. Links are untouched.
   *
   * @throws IndexOutOfBoundsError If `p` is out of bounds.
   */
  setP(p: number, value: T): void {
    checkPhysicalIndex(p, this.length);
    this.store.setPayload(p, value);
  }

  /**
   * Returns a mutable handle to the element at physical index `p`.
   *
   * @throws IndexOutOfBoundsError If `p` is out of bounds.
   */
  refP(p: number): PayloadRef<T> {
    checkPhysicalIndex(p, this.length);
    return new SlotRef(this, p);
  }

  /**
   * Returns the raw entry at physical index `p`: its payload and its links
   * as stored (index values, not positions).
   *
   * @throws IndexOutOfBoundsError If `p` is out of bounds.
   */
  entryP(p: number): Entry<T, I> {
    checkPhysicalIndex(p, this.length);
    return this.store.entry(p);
  }

  /**
   * Returns the first element, or undefined if the list is empty. O(1).
   */
  front(): T | undefined {
    const p = this.headP;
    return p === undefined ? undefined : this.store.payload(p);
  }

  /**
   * Returns the last element, or undefined if the list is empty. O(1).
   */
  back(): T | undefined {
    const p = this.tailP;
    return p === undefined ? undefined : this.store.payload(p);
  }

  frontMut(): PayloadRef<T> | undefined {
    const p = this.headP;
    return p === undefined ? undefined : new SlotRef(this, p);
  }

  backMut(): PayloadRef<T> | undefined {
    const p = this.tailP;
    return p === undefined ? undefined : new SlotRef(this, p);
  }

  /**
   * Returns whether some element is `===` to `value`.
   */
  contains(value: T): boolean {
    for (const element of this) {
      if (element === value) return true;
    }
    return false;
  }

  // Mutators

  /**
   * Inserts `value` first in the logical order and last in the physical array.
   *
   * @throws CapacityOverflowError If the list already holds `index.maxPosition + 1` elements.
   */
  pushFront(value: T): void {
    const inserted = this.pushP(value);
    // Insert at head = insert before whatever head currently points to.
    this.insertNodeBefore(inserted, this.head);
    this._epoch++;
  }

  /**
   * Inserts `value` last in the logical order and last in the physical array.
   *
   * @throws CapacityOverflowError If the list already holds `index.maxPosition + 1` elements.
   */
  pushBack(value: T): void {
    const inserted = this.pushP(value);
    // Insert at tail = insert after whatever tail currently points to.
    this.insertNodeAfter(inserted, this.tail);
    this._epoch++;
  }

  /**
   * Removes and returns the first element in the logical order, if any.
   */
  popFront(): T | undefined {
    const p = this.headP;
    if (p === undefined) return undefined;
    return this.inSwapRemove(p);
  }

  /**
   * Removes and returns the last element in the logical order, if any.
   */
  popBack(): T | undefined {
    const p = this.tailP;
    if (p === undefined) return undefined;
    return this.inSwapRemove(p);
  }

  /**
   * Removes and returns the last element in the physical array, if any.
   */
  pop(): T | undefined {
    if (this.isEmpty()) return undefined;
    return this.inSwapRemove(this.length - 1);
  }

  /**
   * Removes and returns the element at physical index `p`.
   * The physically last element moves into slot `p`.
   *
   * @throws IndexOutOfBoundsError If `p` is out of bounds.
   */
  swapRemove(p: number): T {
    checkPhysicalIndex(p, this.length);
    return this.inSwapRemove(p);
  }

  /**
   * Swaps the elements at physical indices `a` and `b`, leaving all links in place.
   * As a result, the two elements also trade places in the logical order.
   *
   * @throws IndexOutOfBoundsError If `a` or `b` is out of bounds.
   */
  swapP(a: number, b: number): void {
    checkPhysicalIndex(a, this.length);
    checkPhysicalIndex(b, this.length);
    if (a !== b) this.store.swapPayloads(a, b);
  }

  /**
   * Tries to reserve capacity for at least `additional` more elements.
   * On failure, the list is unchanged.
   *
   * The error's `kind` tells apart the list's index type running out of positions
   * ("capacity-overflow", whatever memory is available) from the engine refusing the
   * allocation ("alloc-error").
   */
  tryReserve(additional: number): TryResult<void, TryReserveError> {
    checkCount(additional);
    return this.store.tryReserve(additional);
  }

  /**
   * Reserves capacity for at least `additional` more elements.
   *
   * @throws CapacityOverflowError If the index type cannot address that many elements.
   * @throws TryReserveError If the allocation fails.
   */
  reserve(additional: number): void {
    const result = this.tryReserve(additional);
    if (result.ok) return;
    if (result.error.kind === "capacity-overflow") {
      throw new CapacityOverflowError();
    }
    throw result.error;
  }

  /**
   * Removes every element.
   */
  clear(): void {
    this.store.clear();
    this.head = undefined;
    this.tail = undefined;
    this._epoch++;
  }

  /**
   * Moves every element of `other` to the end of this list, in order, leaving `other` empty.
   *
   * This is O(other.length), not O(1): each element is pushed into this list's array.
   *
   * @throws CapacityOverflowError If the combined length exceeds what this list's index
   * type can address. Neither list is changed in that case.
   */
  append<J extends IndexRepr>(other: LinkedVec<T, J>): void {
    if (this.store.limit - this.length < other.length) {
      throw new CapacityOverflowError();
    }
    for (const value of other.drain()) this.pushBack(value);
  }

  /**
   * Pushes each of `values` to the back of the list.
   *
   * If `values` knows its size (an array, Set, Map or LinkedVec), capacity for it is
   * reserved first. That reservation is best-effort: if it fails, the pushes proceed and
   * the first one that does not fit throws.
   *
   * @throws CapacityOverflowError On the first element that does not fit.
   */
  extend(values: Iterable<T>): void {
    const hint = values instanceof LinkedVec ? values.length : sizeHint(values);
    if (hint > 0) {
      // A failed reservation is reported by the push that overflows.
      this.tryReserve(hint);
    }
    for (const value of values) this.pushBack(value);
  }

  // Iterators and cursors

  /**
   * Iterates over the elements in logical order.
   */
  [Symbol.iterator](): Iter<T, I> {
    return this.iter();
  }

  /**
   * Returns a double-ended iterator over the elements in logical order.
   */
  iter(): Iter<T, I> {
    return new Iter(this);
  }

  /**
   * Returns a double-ended iterator over mutable handles to the elements,
   * in logical order.
   */
  iterMut(): IterMut<T, I> {
    return new IterMut(this);
  }

  /**
   * Returns a double-ended iterator over the elements' physical indices,
   * in logical order.
   */
  iterP(): IterP<T, I> {
    return new IterP(this);
  }

  /**
   * Moves all elements into a consuming iterator, leaving this list empty.
   * The iterator pops from the front (`next`) or back (`nextBack`).
   */
  drain(): IntoIter<T, I> {
    const taken = new LinkedVec<T, I>(this.index);
    taken.store = this.store;
    taken.head = this.head;
    taken.tail = this.tail;

    this.store = new NodeStore<T, I>(this.index);
    this.head = undefined;
    this.tail = undefined;
    this._epoch++;
    return new IntoIter(taken);
  }

  /**
   * Returns a cursor at the first element, or at the ghost position if the list is empty.
   */
  cursorFront(): VecCursor<T, I> {
    const head = this.headP;
    return VecCursor.atUnchecked(this, head === undefined ? undefined : 0, head);
  }

  /**
   * Returns a cursor at the last element, or at the ghost position if the list is empty.
   */
  cursorBack(): VecCursor<T, I> {
    const tail = this.tailP;
    return VecCursor.atUnchecked(
      this,
      tail === undefined ? undefined : this.length - 1,
      tail
    );
  }

  cursorFrontMut(): VecCursorMut<T, I> {
    const head = this.headP;
    return VecCursorMut.atUnchecked(
      this,
      head === undefined ? undefined : 0,
      head
    );
  }

  cursorBackMut(): VecCursorMut<T, I> {
    const tail = this.tailP;
    return VecCursorMut.atUnchecked(
      this,
      tail === undefined ? undefined : this.length - 1,
      tail
    );
  }

  // Comparison

  /**
   * Returns whether both lists hold equal elements in the same logical order.
   * Physical layout is ignored.
   *
   * @param eq Element equality. Default: `===` (so NaN is unequal to itself).
   */
  equals<J extends IndexRepr>(
    other: LinkedVec<T, J>,
    eq: (a: T, b: T) => boolean = (a, b) => a === b
  ): boolean {
    if (this.length !== other.length) return false;
    const theirs = other.iter();
    for (const mine of this) {
      const result = theirs.next();
      if (result.done || !eq(mine, result.value)) return false;
    }
    return true;
  }

  /**
   * Lexicographically compares the logical sequences of both lists.
   * Returns undefined if some decisive element pair is incomparable (e.g. NaN).
   *
   * @param compare Element order. Default: {@link comparePrimitives}, which handles
   * numbers, bigints and strings.
   */
  partialCmp<J extends IndexRepr>(
    other: LinkedVec<T, J>,
    compare: PartialComparator<T> = comparePrimitives
  ): Ordering | undefined {
    return partialCompareSequences<T>(this, other, compare);
  }

  lt<J extends IndexRepr>(
    other: LinkedVec<T, J>,
    compare?: PartialComparator<T>
  ): boolean {
    return this.partialCmp(other, compare) === -1;
  }

  le<J extends IndexRepr>(
    other: LinkedVec<T, J>,
    compare?: PartialComparator<T>
  ): boolean {
    const ord = this.partialCmp(other, compare);
    return ord === -1 || ord === 0;
  }

  gt<J extends IndexRepr>(
    other: LinkedVec<T, J>,
    compare?: PartialComparator<T>
  ): boolean {
    return this.partialCmp(other, compare) === 1;
  }

  ge<J extends IndexRepr>(
    other: LinkedVec<T, J>,
    compare?: PartialComparator<T>
  ): boolean {
    const ord = this.partialCmp(other, compare);
    return ord === 1 || ord === 0;
  }

  // Copying and debugging

  /**
   * Returns a copy with the same elements (shallow) and the same physical layout.
   */
  clone(): LinkedVec<T, I> {
    const copy = new LinkedVec<T, I>(this.index);
    copy.store.copyFrom(this.store);
    copy.head = this.head;
    copy.tail = this.tail;
    return copy;
  }

  /**
   * Makes this list a copy of `source`, with the same physical layout.
   * `source` may use a different index type: its links are re-encoded with this list's.
   *
   * @throws CapacityOverflowError If `source` is longer than this list's index type
   * can address. This list is unchanged in that case.
   */
  cloneFrom<J extends IndexRepr>(source: LinkedVec<T, J>): void {
    const length = source.length;
    if (length > this.store.limit) throw new CapacityOverflowError();

    // Built aside, so that source may be this list.
    const store = new NodeStore<T, I>(this.index);
    const reserved = store.tryReserve(length);
    if (!reserved.ok) throw reserved.error;
    for (let p = 0; p < length; p++) {
      store.push(source.getP(p));
      store.setNext(p, this.link(source.nextP(p)));
      store.setPrev(p, this.link(source.prevP(p)));
    }

    this.store = store;
    this.head = this.link(source.headP);
    this.tail = this.link(source.tailP);
    this._epoch++;
  }

  /**
   * Iterates over `[physical index, element]` pairs in logical order.
   */
  *debugEntries(): IterableIterator<[number, T]> {
    for (const p of this.iterP()) yield [p, this.store.payload(p)];
  }

  /**
   * Renders the list as a map from physical index to element, in logical order,
   * e.g. `{9: 0, 1: 1, 0: 2}`. Strings are quoted.
   */
  toString(): string {
    const parts: string[] = [];
    for (const [p, value] of this.debugEntries()) {
      parts.push(`${p}: ${formatDebug(value)}`);
    }
    return `{${parts.join(", ")}}`;
  }

  /**
   * Throws if any structural invariant is broken. Intended for tests and debugging; O(n).
   */
  checkInvariants(): void {
    checkLinks(this);
  }

  // Link maintenance

  private position(link: I | undefined): number | undefined {
    return link === undefined ? undefined : this.index.toPositionUnchecked(link);
  }

  private link(p: number | undefined): I | undefined {
    return p === undefined ? undefined : this.index.fromPositionUnchecked(p);
  }

  private pushP(value: T): I {
    const p = this.store.push(value);
    // p < limit, so it is representable.
    return this.index.fromPositionUnchecked(p);
  }

  /**
   * Unlinks slot p, then densifies the array. Returns p's payload.
   */
  private inSwapRemove(p: number): T {
    this.removeNodeP(p);
    const last = this.length - 1;
    const payload = this.store.swapRemove(p);
    if (p !== last) this.moveNodeP(p);
    this._epoch++;
    return payload;
  }

  /**
   * Makes the neighbors of the entry now at slot p point back to p.
   */
  private moveNodeP(p: number): void {
    const stored = this.index.fromPositionUnchecked(p);
    this.setNext(this.store.getPrev(p), stored);
    this.setPrev(this.store.getNext(p), stored);
  }

  private insertNodeBefore(inserted: I, target: I | undefined): void {
    const other = this.getPrev(target);
    this.pair(other, inserted);
    this.pair(inserted, target);
  }

  private insertNodeAfter(inserted: I, target: I | undefined): void {
    const other = this.getNext(target);
    this.pair(target, inserted);
    this.pair(inserted, other);
  }

  private removeNodeP(p: number): void {
    this.pair(this.store.getPrev(p), this.store.getNext(p));
  }

  /**
   * Gets `next` of the given node, or head if undefined.
   */
  private getNext(target: I | undefined): I | undefined {
    if (target === undefined) return this.head;
    return this.store.getNext(this.index.toPositionUnchecked(target));
  }

  /**
   * Gets `prev` of the given node, or tail if undefined.
   */
  private getPrev(target: I | undefined): I | undefined {
    if (target === undefined) return this.tail;
    return this.store.getPrev(this.index.toPositionUnchecked(target));
  }

  /**
   * Sets `next` of the given node, or head if undefined.
   */
  private setNext(target: I | undefined, value: I | undefined): void {
    if (target === undefined) this.head = value;
    else this.store.setNext(this.index.toPositionUnchecked(target), value);
  }

  /**
   * Sets `prev` of the given node, or tail if undefined.
   */
  private setPrev(target: I | undefined, value: I | undefined): void {
    if (target === undefined) this.tail = value;
    else this.store.setPrev(this.index.toPositionUnchecked(target), value);
  }

  private pair(first: I | undefined, second: I | undefined): void {
    this.setNext(first, second);
    this.setPrev(second, first);
  }
}

function formatDebug(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}
