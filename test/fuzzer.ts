import { expect } from "chai";
import { IndexRepr, LinkedVec, StoreIndex } from "../src";
import { DequeSimple } from "./deque_simple";

const DEBUG = false;

/**
 * Applies mutations to both LinkedVec and DequeSimple (a simpler, known-good implementation),
 * erroring if the resulting states differ.
 */
export class Fuzzer<I extends IndexRepr> {
  readonly list: LinkedVec<number, I>;
  readonly simple: DequeSimple<number>;

  constructor(readonly index: StoreIndex<I>) {
    this.list = LinkedVec.withIndex<number, I>(index);
    this.simple = new DequeSimple<number>(index.maxPosition + 1);
  }

  /**
   * Check that all accessors agree.
   *
   * Not called on every mutation because it is more expensive.
   */
  checkAll() {
    expect(this.list.length).to.equal(this.simple.length);
    expect(this.list.isEmpty()).to.equal(this.simple.length === 0);
    expect(this.list.front()).to.equal(this.simple.front());
    expect(this.list.back()).to.equal(this.simple.back());
    for (let p = 0; p < this.simple.length; p++) {
      expect(this.list.getP(p)).to.equal(this.simple.getP(p));
    }
    expect([...this.list]).to.deep.equal(this.simple.values());
    expect([...this.list.iter().rev()]).to.deep.equal(
      this.simple.values().reverse()
    );
    expect([...this.list.iterP()]).to.deep.equal(this.simple.indicesP());
    expect(this.list.toString()).to.equal(
      "{" +
        this.simple
          .entries()
          .map(([p, value]) => `${p}: ${value}`)
          .join(", ") +
        "}"
    );
  }

  pushFront(value: number) {
    if (DEBUG) {
      console.log("pushFront", value);
    }
    this.apply(
      () => this.list.pushFront(value),
      () => this.simple.pushFront(value)
    );
  }

  pushBack(value: number) {
    if (DEBUG) {
      console.log("pushBack", value);
    }
    this.apply(
      () => this.list.pushBack(value),
      () => this.simple.pushBack(value)
    );
  }

  popFront() {
    if (DEBUG) {
      console.log("popFront");
    }
    return this.apply(
      () => this.list.popFront(),
      () => this.simple.popFront()
    );
  }

  popBack() {
    if (DEBUG) {
      console.log("popBack");
    }
    return this.apply(
      () => this.list.popBack(),
      () => this.simple.popBack()
    );
  }

  pop() {
    if (DEBUG) {
      console.log("pop");
    }
    return this.apply(
      () => this.list.pop(),
      () => this.simple.pop()
    );
  }

  swapRemove(p: number) {
    if (DEBUG) {
      console.log("swapRemove", p);
    }
    return this.apply(
      () => this.list.swapRemove(p),
      () => this.simple.swapRemove(p)
    );
  }

  swapP(a: number, b: number) {
    if (DEBUG) {
      console.log("swapP", a, b);
    }
    this.apply(
      () => this.list.swapP(a, b),
      () => this.simple.swapP(a, b)
    );
  }

  setP(p: number, value: number) {
    if (DEBUG) {
      console.log("setP", p, value);
    }
    this.apply(
      () => this.list.setP(p, value),
      () => this.simple.setP(p, value)
    );
  }

  extend(values: number[]) {
    if (DEBUG) {
      console.log("extend", values);
    }
    this.apply(
      () => this.list.extend(values),
      () => this.simple.extend(values)
    );
  }

  clear() {
    if (DEBUG) {
      console.log("clear");
    }
    this.apply(
      () => this.list.clear(),
      () => this.simple.clear()
    );
  }

  /**
   * Runs one mutation on both implementations. If one throws, the other must throw
   * the same message; the error is rethrown for the caller. Otherwise the results
   * and the resulting states must agree.
   */
  private apply<R>(onList: () => R, onSimple: () => R): R {
    let result: R;
    try {
      result = onList();
    } catch (e) {
      if (DEBUG) {
        console.log("LinkedVec threw error", e);
      }
      const message = e instanceof Error ? e.message : String(e);
      expect(onSimple).to.throw(message);
      this.checkState();
      // Throw the original error for the caller.
      // Our tests filter out non-AssertionErrors.
      throw e;
    }
    expect(onSimple()).to.equal(result);
    this.checkState();
    return result;
  }

  private checkState() {
    this.list.checkInvariants();
    expect([...this.list.debugEntries()]).to.deep.equal(this.simple.entries());
  }
}
