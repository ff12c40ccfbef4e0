import { CapacityOverflowError, err, ok, TryReserveError, TryResult } from "../errors";
import { IndexRepr, IntColumn, StoreIndex } from "../store_index";

const GROW = (n: number) => Math.max(4, n * 2);

// Presence bits for plain index types.
const HAS_NEXT = 1;
const HAS_PREV = 2;

/**
 * One physical slot, read out of a NodeStore.
 */
export interface Entry<T, I extends IndexRepr> {
  readonly payload: T;
  readonly next: I | undefined;
  readonly prev: I | undefined;
}

/**
 * The dense backing array of a LinkedVec, stored as columns:
 * payloads in a plain array, and the next/prev links in typed arrays sized
 * by the list's StoreIndex.
 *
 * An absent link is encoded by the index type's maximum bit pattern when the
 * index type is sentinel-free, and by a cleared bit in a separate `presence`
 * column otherwise.
 *
 * NodeStore does no bounds checks; LinkedVec validates physical indices first.
 */
export class NodeStore<T, I extends IndexRepr> {
  private payloads: T[] = [];
  private _capacity = 0;
  private next: IntColumn<I>;
  private prev: IntColumn<I>;
  private presence: Uint8Array | null;

  constructor(readonly index: StoreIndex<I>) {
    this.next = index.kind.allocate(0);
    this.prev = index.kind.allocate(0);
    this.presence = index.nonMax ? null : new Uint8Array(0);
  }

  get length(): number {
    return this.payloads.length;
  }

  get capacity(): number {
    return this._capacity;
  }

  /**
   * The most entries this store may ever hold.
   */
  get limit(): number {
    return this.index.maxPosition + 1;
  }

  payload(p: number): T {
    return this.payloads[p];
  }

  setPayload(p: number, value: T): void {
    this.payloads[p] = value;
  }

  getNext(p: number): I | undefined {
    return this.read(this.next, p, HAS_NEXT);
  }

  getPrev(p: number): I | undefined {
    return this.read(this.prev, p, HAS_PREV);
  }

  setNext(p: number, link: I | undefined): void {
    this.write(this.next, p, HAS_NEXT, link);
  }

  setPrev(p: number, link: I | undefined): void {
    this.write(this.prev, p, HAS_PREV, link);
  }

  entry(p: number): Entry<T, I> {
    return {
      payload: this.payloads[p],
      next: this.getNext(p),
      prev: this.getPrev(p),
    };
  }

  /**
   * Appends an unlinked entry at the physical end.
   *
   * @throws CapacityOverflowError If the store already holds `limit` entries.
   */
  push(value: T): number {
    const p = this.payloads.length;
    if (p >= this.limit) throw new CapacityOverflowError();
    if (p >= this._capacity) this.grow(p + 1);

    this.payloads.push(value);
    this.setNext(p, undefined);
    this.setPrev(p, undefined);
    return p;
  }

  /**
   * Moves the physically last entry into slot `p` (overwriting it) and shrinks
   * the store by one. The moved entry's links are copied unchanged;
   * repairing its neighbors is the caller's job.
   *
   * Returns the payload that was in slot `p`.
   */
  swapRemove(p: number): T {
    const last = this.payloads.length - 1;
    const removed = this.payloads[p];
    if (p !== last) {
      this.payloads[p] = this.payloads[last];
      this.next[p] = this.next[last];
      this.prev[p] = this.prev[last];
      if (this.presence !== null) this.presence[p] = this.presence[last];
    }
    this.payloads.pop();
    return removed;
  }

  swapPayloads(a: number, b: number): void {
    const tmp = this.payloads[a];
    this.payloads[a] = this.payloads[b];
    this.payloads[b] = tmp;
  }

  /**
   * Ensures capacity for at least `additional` more entries.
   * On failure, the store is unchanged.
   */
  tryReserve(additional: number): TryResult<void, TryReserveError> {
    const length = this.payloads.length;
    if (this.limit - length < additional) {
      return err(new TryReserveError("capacity-overflow"));
    }
    const required = length + additional;
    if (required <= this._capacity) return ok(undefined);

    try {
      this.grow(required);
    } catch (e) {
      if (e instanceof RangeError) {
        return err(new TryReserveError("alloc-error", e));
      }
      throw e;
    }
    return ok(undefined);
  }

  /**
   * Drops every entry and releases the link columns.
   */
  clear(): void {
    this.payloads = [];
    this._capacity = 0;
    this.next = this.index.kind.allocate(0);
    this.prev = this.index.kind.allocate(0);
    this.presence = this.index.nonMax ? null : new Uint8Array(0);
  }

  /**
   * Makes this store an independent copy of `source`, with the same physical layout.
   */
  copyFrom(source: NodeStore<T, I>): void {
    if (source === this) return;
    const length = source.length;
    this.clear();
    if (length === 0) return;
    this.grow(length);
    this.payloads = source.payloads.slice();
    for (let p = 0; p < length; p++) {
      this.next[p] = source.next[p];
      this.prev[p] = source.prev[p];
    }
    if (this.presence !== null && source.presence !== null) {
      this.presence.set(source.presence.subarray(0, length));
    }
  }

  private read(column: IntColumn<I>, p: number, bit: number): I | undefined {
    if (this.presence === null) {
      const cell = column[p];
      return cell === this.index.kind.max ? undefined : cell;
    }
    return (this.presence[p] & bit) === 0 ? undefined : column[p];
  }

  private write(
    column: IntColumn<I>,
    p: number,
    bit: number,
    link: I | undefined
  ): void {
    if (this.presence === null) {
      column[p] = link === undefined ? this.index.kind.max : link;
      return;
    }
    if (link === undefined) {
      column[p] = this.index.kind.zero;
      this.presence[p] &= ~bit;
    } else {
      column[p] = link;
      this.presence[p] |= bit;
    }
  }

  /**
   * Reallocates the link columns with room for `minCapacity` entries,
   * never more than `limit`.
   */
  private grow(minCapacity: number): void {
    const capacity = Math.max(
      minCapacity,
      Math.min(GROW(this._capacity), this.limit)
    );
    const length = this.payloads.length;
    const kind = this.index.kind;

    // Allocate everything before touching state, so a RangeError leaves us intact.
    const next = kind.allocate(capacity);
    const prev = kind.allocate(capacity);
    const presence = this.presence === null ? null : new Uint8Array(capacity);

    for (let p = 0; p < length; p++) {
      next[p] = this.next[p];
      prev[p] = this.prev[p];
    }
    if (presence !== null && this.presence !== null) {
      presence.set(this.presence.subarray(0, length));
    }

    this.next = next;
    this.prev = prev;
    this.presence = presence;
    this._capacity = capacity;
  }
}
