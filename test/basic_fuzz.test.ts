import { expect } from "chai";
import seedrandom from "seedrandom";
import {
  CapacityOverflowError,
  I8,
  IndexOutOfBoundsError,
  IndexRepr,
  NonMaxI16,
  NonMaxI8,
  NonMaxU128,
  NonMaxU8,
  StoreIndex,
  U64,
  U8,
  Usize,
} from "../src";
import { Fuzzer } from "./fuzzer";

describe("LinkedVec Fuzzer Tests", () => {
  let prng!: seedrandom.PRNG;

  beforeEach(() => {
    prng = seedrandom("42");
  });

  const randInt = (bound: number) => Math.floor(prng() * bound);

  // Occasionally out of bounds, so that both implementations must throw.
  const randomP = (length: number) => randInt(length + 2) - 1;

  // Out-of-bounds and capacity errors are expected, as long as both
  // implementations agree (else Fuzzer throws an AssertionError).
  function rethrowUnexpected(e: unknown) {
    if (
      !(e instanceof IndexOutOfBoundsError || e instanceof CapacityOverflowError)
    ) {
      throw e;
    }
  }

  function runSequence<I extends IndexRepr>(
    index: StoreIndex<I>,
    operationCount: number,
    pushBias: number
  ) {
    const fuzzer = new Fuzzer(index);
    let nextValue = 0;

    for (let i = 0; i < operationCount; i++) {
      // Every 10 operations, check all accessors
      if (i % 10 === 0) {
        fuzzer.checkAll();
      }

      try {
        if (prng() < pushBias) {
          if (prng() < 0.5) fuzzer.pushFront(nextValue++);
          else fuzzer.pushBack(nextValue++);
          continue;
        }

        const length = fuzzer.simple.length;
        const operation = randInt(8);
        switch (operation) {
          case 0:
            fuzzer.popFront();
            break;
          case 1:
            fuzzer.popBack();
            break;
          case 2:
            fuzzer.pop();
            break;
          case 3:
          case 4:
            fuzzer.swapRemove(randomP(length));
            break;
          case 5:
            fuzzer.swapP(randomP(length), randomP(length));
            break;
          case 6:
            fuzzer.setP(randomP(length), nextValue++);
            break;
          case 7: {
            if (prng() < 0.05) {
              fuzzer.clear();
            } else {
              const count = randInt(6);
              const values: number[] = [];
              for (let j = 0; j < count; j++) values.push(nextValue++);
              fuzzer.extend(values);
            }
            break;
          }
        }
      } catch (e) {
        rethrowUnexpected(e);
      }
    }

    fuzzer.checkAll();
  }

  /**
   * Fills the list to its index type's limit, then mixes removals with pushes
   * that overflow whenever the list is full.
   */
  function runAtCeiling<I extends IndexRepr>(
    index: StoreIndex<I>,
    operationCount: number
  ) {
    const fuzzer = new Fuzzer(index);
    let nextValue = 0;
    const limit = index.maxPosition + 1;
    for (let i = 0; i < limit; i++) fuzzer.pushBack(nextValue++);

    for (let i = 0; i < operationCount; i++) {
      try {
        switch (randInt(4)) {
          case 0:
            fuzzer.swapRemove(randInt(fuzzer.simple.length));
            break;
          case 1:
            fuzzer.pop();
            break;
          case 2:
            fuzzer.pushFront(nextValue++);
            break;
          case 3:
            fuzzer.pushBack(nextValue++);
            break;
        }
      } catch (e) {
        rethrowUnexpected(e);
      }
      expect(fuzzer.list.length).to.be.at.most(limit);
    }

    fuzzer.checkAll();
  }

  function fuzzIndex<I extends IndexRepr>(index: StoreIndex<I>) {
    describe(index.name, () => {
      it("should agree on balanced random sequences", function () {
        this.timeout(30000);
        for (let trial = 0; trial < 50; trial++) {
          runSequence(index, 200, 0.5);
        }
      });

      it("should agree on push-heavy random sequences", function () {
        this.timeout(30000);
        for (let trial = 0; trial < 10; trial++) {
          runSequence(index, 600, 0.8);
        }
      });
    });
  }

  fuzzIndex(I8);
  fuzzIndex(U8);
  fuzzIndex(NonMaxI8);
  fuzzIndex(NonMaxU8);
  fuzzIndex(NonMaxI16);
  fuzzIndex(U64);
  fuzzIndex(NonMaxU128);
  fuzzIndex(Usize);

  describe("at the capacity ceiling", () => {
    it("should agree for NonMaxU8", function () {
      this.timeout(30000);
      for (let trial = 0; trial < 10; trial++) runAtCeiling(NonMaxU8, 400);
    });

    it("should agree for I8", function () {
      this.timeout(30000);
      for (let trial = 0; trial < 10; trial++) runAtCeiling(I8, 400);
    });
  });
});
