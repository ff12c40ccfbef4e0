import { BorrowError } from "./errors";
import type { LinkedVec } from "./linked_vec";
import type { IndexRepr } from "./store_index";

/**
 * A writable view of the payload in one physical slot, checked against the list's epoch.
 *
 * Reading or writing `value` after the list is structurally modified throws
 * {@link BorrowError}: the slot may by then hold a different element.
 */
export interface PayloadRef<T> {
  value: T;
  /**
   * The physical index this handle addresses.
   */
  readonly indexP: number;
}

export class SlotRef<T, I extends IndexRepr> implements PayloadRef<T> {
  private readonly epoch: number;

  constructor(
    private readonly list: LinkedVec<T, I>,
    readonly indexP: number
  ) {
    this.epoch = list.epoch;
  }

  get value(): T {
    this.check();
    return this.list.getP(this.indexP);
  }

  set value(value: T) {
    this.check();
    this.list.setP(this.indexP, value);
  }

  private check() {
    if (this.list.epoch !== this.epoch) throw new BorrowError("PayloadRef");
  }
}
