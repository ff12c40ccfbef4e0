export type Ordering = -1 | 0 | 1;

/**
 * Compares two values, returning undefined if they are incomparable
 * (e.g. either is NaN).
 */
export type PartialComparator<T> = (a: T, b: T) => Ordering | undefined;

/**
 * The default element order for list comparisons: numbers, bigints and strings
 * compare with `<`; NaN is incomparable to everything, itself included.
 *
 * @throws TypeError For any other pair of types. Pass an explicit comparator instead.
 */
export function comparePrimitives(a: unknown, b: unknown): Ordering | undefined {
  if (
    (typeof a === "number" || typeof a === "bigint") &&
    (typeof b === "number" || typeof b === "bigint")
  ) {
    if (a < b) return -1;
    if (a > b) return 1;
    if (a == b) return 0;
    return undefined;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new TypeError(
    `No default ordering for ${typeof a} and ${typeof b}; pass a comparator`
  );
}

/**
 * Lexicographic partial comparison of two sequences.
 *
 * The first element pair that is not equal decides, including an incomparable pair,
 * which makes the whole comparison undefined. If one sequence is a prefix of the
 * other, the shorter one is less.
 */
export function partialCompareSequences<T>(
  a: Iterable<T>,
  b: Iterable<T>,
  compare: PartialComparator<T>
): Ordering | undefined {
  const itA = a[Symbol.iterator]();
  const itB = b[Symbol.iterator]();
  for (;;) {
    const x = itA.next();
    const y = itB.next();
    if (x.done) return y.done ? 0 : -1;
    if (y.done) return 1;
    const ord = compare(x.value, y.value);
    if (ord !== 0) return ord;
  }
}
