import { expect } from "chai";
import { BorrowError, LinkedVec, NonMaxU16 } from "../src";

describe("Iterators", () => {
  let list: LinkedVec<number>;

  beforeEach(() => {
    list = LinkedVec.from([1, 2, 3, 4, 5]);
  });

  describe("Iter", () => {
    it("should meet in the middle when advanced from both ends", () => {
      const iter = list.iter();
      expect(iter.remaining).to.equal(5);
      expect(iter.next().value).to.equal(1);
      expect(iter.nextBack().value).to.equal(5);
      expect(iter.next().value).to.equal(2);
      expect(iter.nextBack().value).to.equal(4);
      expect(iter.remaining).to.equal(1);
      expect(iter.next().value).to.equal(3);
      expect(iter.remaining).to.equal(0);
      expect(iter.next().done).to.be.true;
      expect(iter.nextBack().done).to.be.true;
    });

    it("should reverse", () => {
      expect([...list.iter().rev()]).to.deep.equal([5, 4, 3, 2, 1]);

      const iter = list.iter();
      iter.next();
      const reversed = iter.rev();
      expect(reversed.next().value).to.equal(5);
      expect([...reversed.rev()]).to.deep.equal([2, 3, 4]);
    });

    it("should clone independently", () => {
      const iter = list.iter();
      iter.next();
      const copy = iter.clone();
      expect([...iter]).to.deep.equal([2, 3, 4, 5]);
      expect([...copy]).to.deep.equal([2, 3, 4, 5]);
    });

    it("should start fresh on every call", () => {
      expect([...list]).to.deep.equal([1, 2, 3, 4, 5]);
      expect([...list]).to.deep.equal([1, 2, 3, 4, 5]);
    });

    it("should allow concurrent readers", () => {
      const a = list.iter();
      const b = list.iter().rev();
      const pairs: [number, number][] = [];
      for (const x of a) {
        const y = b.next();
        if (y.done) break;
        pairs.push([x, y.value]);
      }
      expect(pairs).to.deep.equal([
        [1, 5],
        [2, 4],
        [3, 3],
        [4, 2],
        [5, 1],
      ]);
    });

    it("should be empty for an empty list", () => {
      const iter = LinkedVec.new<number>().iter();
      expect(iter.remaining).to.equal(0);
      expect(iter.next().done).to.be.true;
      expect(iter.nextBack().done).to.be.true;
    });

    it("should follow links, not physical order", () => {
      const shuffled = LinkedVec.withIndex<number, number>(NonMaxU16);
      shuffled.pushBack(2);
      shuffled.pushFront(1);
      shuffled.pushBack(3);
      expect([...shuffled]).to.deep.equal([1, 2, 3]);
      expect([...shuffled.iterP()]).to.deep.equal([1, 0, 2]);
      expect([...shuffled.iterP().rev()]).to.deep.equal([2, 0, 1]);
    });

    it("should fail after a structural change", () => {
      const iter = list.iter();
      iter.next();
      list.pushBack(6);
      expect(() => iter.next()).to.throw(
        BorrowError,
        "Iterator used after its list was structurally modified"
      );
    });

    it("should survive payload writes", () => {
      const iter = list.iter();
      iter.next();
      list.setP(1, 20);
      list.swapP(2, 3);
      expect([...iter]).to.deep.equal([20, 4, 3, 5]);
    });
  });

  describe("IterP", () => {
    it("should clone independently", () => {
      const iter = list.iterP();
      iter.nextBack();
      const copy = iter.clone();
      expect([...iter]).to.deep.equal([0, 1, 2, 3]);
      expect(copy.remaining).to.equal(4);
    });
  });

  describe("IterMut", () => {
    it("should write every element", () => {
      for (const ref of list.iterMut()) ref.value *= 10;
      expect([...list]).to.deep.equal([10, 20, 30, 40, 50]);
    });

    it("should keep all handles usable at once", () => {
      const refs = [...list.iterMut()];
      expect(refs.length).to.equal(5);
      expect(new Set(refs.map((ref) => ref.indexP)).size).to.equal(5);

      const first = refs[0].value;
      refs[0].value = refs[4].value;
      refs[4].value = first;
      expect([...list]).to.deep.equal([5, 2, 3, 4, 1]);
    });

    it("should be double-ended", () => {
      const iter = list.iterMut();
      const back = iter.nextBack();
      if (back.done) throw new Error("expected a handle");
      back.value.value = 0;
      expect(iter.remaining).to.equal(4);
      expect([...iter.rev()].map((ref) => ref.value)).to.deep.equal([
        4, 3, 2, 1,
      ]);
      expect(list.back()).to.equal(0);
    });

    it("should invalidate handles on structural changes", () => {
      const refs = [...list.iterMut()];
      list.popFront();
      expect(() => refs[1].value).to.throw(BorrowError);
    });
  });

  describe("IntoIter", () => {
    it("should drain in reverse", () => {
      expect([...list.drain().rev()]).to.deep.equal([5, 4, 3, 2, 1]);
      expect(list.isEmpty()).to.be.true;
    });

    it("should drop remaining elements along with the iterator", () => {
      const drained = list.drain();
      drained.next();
      list.pushBack(9);
      expect(drained.remaining).to.equal(4);
      expect([...list]).to.deep.equal([9]);
    });
  });
});
