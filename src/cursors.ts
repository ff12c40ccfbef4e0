import { BorrowError } from "./errors";
import { debugAssertionsEnabled } from "./internal/debug";
import type { LinkedVec } from "./linked_vec";
import { PayloadRef, SlotRef } from "./payload_ref";
import type { IndexRepr } from "./store_index";

/**
 * Where a cursor is: at a node (logical index + physical index), or at the ghost
 * position between tail and head.
 *
 * The ghost has no direction: moving forward from it always reaches the head,
 * moving backward always reaches the tail, however the cursor got there.
 * A cursor on an empty list is always at the ghost.
 */
export type CursorPosition =
  | { readonly kind: "ghost" }
  | { readonly kind: "node"; readonly indexL: number; readonly indexP: number };

const GHOST: CursorPosition = { kind: "ghost" };

function validatePosition<T, I extends IndexRepr>(
  list: LinkedVec<T, I>,
  indexL: number | undefined,
  indexP: number | undefined
): void {
  if ((indexL === undefined) !== (indexP === undefined)) {
    throw new Error(
      `Cursor position must set both or neither of indexL (${indexL}) and indexP (${indexP})`
    );
  }
  if (indexL === undefined || indexP === undefined) return;
  const length = list.length;
  if (
    !(Number.isSafeInteger(indexL) && 0 <= indexL && indexL < length) ||
    !(Number.isSafeInteger(indexP) && 0 <= indexP && indexP < length)
  ) {
    throw new Error(
      `Cursor position (${indexL}, ${indexP}) out of bounds (length: ${length})`
    );
  }
}

function toPosition(
  indexL: number | undefined,
  indexP: number | undefined
): CursorPosition {
  return indexL === undefined || indexP === undefined
    ? GHOST
    : { kind: "node", indexL, indexP };
}

/**
 * Shared navigation for {@link VecCursor} and {@link VecCursorMut}.
 */
abstract class CursorBase<T, I extends IndexRepr> {
  protected readonly epoch: number;

  protected constructor(
    protected readonly list: LinkedVec<T, I>,
    protected position: CursorPosition,
    epoch?: number
  ) {
    this.epoch = epoch ?? list.epoch;
  }

  /**
   * The current element's logical index (0 at head), or undefined at the ghost.
   */
  indexL(): number | undefined {
    this.check();
    return this.position.kind === "node" ? this.position.indexL : undefined;
  }

  /**
   * The current element's physical index, or undefined at the ghost.
   */
  indexP(): number | undefined {
    this.check();
    return this.position.kind === "node" ? this.position.indexP : undefined;
  }

  /**
   * Moves to the next element in logical order. From the tail this reaches the ghost;
   * from the ghost, the head.
   */
  moveNext(): void {
    this.check();
    this.position = this.stepNext(this.position);
  }

  /**
   * Moves to the previous element in logical order. From the head this reaches the ghost;
   * from the ghost, the tail.
   */
  movePrev(): void {
    this.check();
    this.position = this.stepPrev(this.position);
  }

  front(): T | undefined {
    this.check();
    return this.list.front();
  }

  back(): T | undefined {
    this.check();
    return this.list.back();
  }

  /**
   * Returns a cursor with no ghost state at the current element, or undefined at the ghost.
   */
  asNonEmptyCursor(): NonEmptyVecCursor<T, I> | undefined {
    this.check();
    if (this.position.kind === "ghost") return undefined;
    return new NonEmptyVecCursor(
      this.list,
      this.position.indexL,
      this.position.indexP,
      this.epoch
    );
  }

  protected stepNext(position: CursorPosition): CursorPosition {
    if (position.kind === "ghost") {
      return toPosition(0, this.list.headP);
    }
    const next = this.list.nextP(position.indexP);
    return next === undefined
      ? GHOST
      : { kind: "node", indexL: position.indexL + 1, indexP: next };
  }

  protected stepPrev(position: CursorPosition): CursorPosition {
    if (position.kind === "ghost") {
      return toPosition(this.list.length - 1, this.list.tailP);
    }
    const prev = this.list.prevP(position.indexP);
    return prev === undefined
      ? GHOST
      : { kind: "node", indexL: position.indexL - 1, indexP: prev };
  }

  protected check(): void {
    if (this.list.epoch !== this.epoch) throw new BorrowError("Cursor");
  }
}

/**
 * A read-only cursor over a list's logical order.
 */
export class VecCursor<T, I extends IndexRepr> extends CursorBase<T, I> {
  /**
   * Constructs a cursor at a known position: both indices for a node, or both
   * undefined for the ghost.
   *
   * The caller guarantees that `indexP` is the physical index of the element at
   * logical index `indexL`. With debug assertions enabled, the pair's shape and
   * bounds are checked.
   */
  static atUnchecked<T, I extends IndexRepr>(
    list: LinkedVec<T, I>,
    indexL: number | undefined,
    indexP: number | undefined
  ): VecCursor<T, I> {
    if (debugAssertionsEnabled()) validatePosition(list, indexL, indexP);
    return new VecCursor(list, toPosition(indexL, indexP));
  }

  /**
   * The current element, or undefined at the ghost.
   */
  current(): T | undefined {
    this.check();
    return this.position.kind === "node"
      ? this.list.getP(this.position.indexP)
      : undefined;
  }

  /**
   * The element `moveNext` would reach, without moving.
   */
  peekNext(): T | undefined {
    const copy = this.clone();
    copy.moveNext();
    return copy.current();
  }

  /**
   * The element `movePrev` would reach, without moving.
   */
  peekPrev(): T | undefined {
    const copy = this.clone();
    copy.movePrev();
    return copy.current();
  }

  clone(): VecCursor<T, I> {
    return new VecCursor(this.list, this.position, this.epoch);
  }

  getList(): LinkedVec<T, I> {
    return this.list;
  }
}

/**
 * A cursor that can also write the elements it visits.
 */
export class VecCursorMut<T, I extends IndexRepr> extends CursorBase<T, I> {
  /**
   * Like {@link VecCursor.atUnchecked}.
   */
  static atUnchecked<T, I extends IndexRepr>(
    list: LinkedVec<T, I>,
    indexL: number | undefined,
    indexP: number | undefined
  ): VecCursorMut<T, I> {
    if (debugAssertionsEnabled()) validatePosition(list, indexL, indexP);
    return new VecCursorMut(list, toPosition(indexL, indexP));
  }

  /**
   * A handle to the current element, or undefined at the ghost.
   */
  current(): PayloadRef<T> | undefined {
    this.check();
    return this.refAt(this.position);
  }

  peekNext(): PayloadRef<T> | undefined {
    this.check();
    return this.refAt(this.stepNext(this.position));
  }

  peekPrev(): PayloadRef<T> | undefined {
    this.check();
    return this.refAt(this.stepPrev(this.position));
  }

  frontMut(): PayloadRef<T> | undefined {
    this.check();
    return this.list.frontMut();
  }

  backMut(): PayloadRef<T> | undefined {
    this.check();
    return this.list.backMut();
  }

  /**
   * Returns a read-only cursor at the same position.
   */
  asCursor(): VecCursor<T, I> {
    this.check();
    return VecCursor.atUnchecked(this.list, this.indexL(), this.indexP());
  }

  private refAt(position: CursorPosition): PayloadRef<T> | undefined {
    return position.kind === "node"
      ? new SlotRef(this.list, position.indexP)
      : undefined;
  }
}

/**
 * A cursor that is always at an element. Moving past either end wraps around.
 * Obtained from `asNonEmptyCursor()` on another cursor.
 */
export class NonEmptyVecCursor<T, I extends IndexRepr> {
  /**
   * Internal - use `asNonEmptyCursor()`.
   */
  constructor(
    private readonly list: LinkedVec<T, I>,
    private _indexL: number,
    private _indexP: number,
    private readonly epoch: number
  ) {}

  indexL(): number {
    this.check();
    return this._indexL;
  }

  indexP(): number {
    this.check();
    return this._indexP;
  }

  current(): T {
    this.check();
    return this.list.getP(this._indexP);
  }

  /**
   * Moves to the next element, wrapping from tail to head.
   * Returns false if it wrapped.
   */
  moveNext(): boolean {
    this.check();
    const next = this.list.nextP(this._indexP);
    if (next === undefined) {
      this.jump(0, this.list.headP);
      return false;
    }
    this._indexL++;
    this._indexP = next;
    return true;
  }

  /**
   * Moves to the previous element, wrapping from head to tail.
   * Returns false if it wrapped.
   */
  movePrev(): boolean {
    this.check();
    const prev = this.list.prevP(this._indexP);
    if (prev === undefined) {
      this.jump(this.list.length - 1, this.list.tailP);
      return false;
    }
    this._indexL--;
    this._indexP = prev;
    return true;
  }

  asCursor(): VecCursor<T, I> {
    this.check();
    return VecCursor.atUnchecked(this.list, this._indexL, this._indexP);
  }

  clone(): NonEmptyVecCursor<T, I> {
    return new NonEmptyVecCursor(
      this.list,
      this._indexL,
      this._indexP,
      this.epoch
    );
  }

  getList(): LinkedVec<T, I> {
    return this.list;
  }

  private jump(indexL: number, indexP: number | undefined): void {
    // The list is non-empty, so head and tail exist.
    if (indexP === undefined) throw new Error("Internal error");
    this._indexL = indexL;
    this._indexP = indexP;
  }

  private check(): void {
    if (this.list.epoch !== this.epoch) throw new BorrowError("Cursor");
  }
}
