/**
 * Outcome of a fallible operation that reports failure as a value instead of throwing.
 */
export type TryResult<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): TryResult<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): TryResult<never, E> {
  return { ok: false, error };
}

/**
 * Thrown when a physical index is outside `[0, length)`.
 *
 * This indicates a programming error, not a recoverable condition.
 */
export class IndexOutOfBoundsError extends Error {
  constructor(readonly index: number, readonly length: number) {
    super(`Index out of bounds: ${index} (length: ${length})`);
    this.name = "IndexOutOfBoundsError";
  }
}

/**
 * Thrown when a list would hold more entries than its index type can address.
 */
export class CapacityOverflowError extends Error {
  constructor() {
    super("capacity overflow");
    this.name = "CapacityOverflowError";
  }
}

/**
 * A value could not be converted between a {@link StoreIndex} representation
 * and a position.
 */
export class IndexConversionError extends Error {
  constructor(
    readonly value: number | bigint,
    readonly indexName: string,
    readonly direction: "toPosition" | "fromPosition"
  ) {
    super(
      direction === "fromPosition"
        ? `position ${value} is out of range for index type ${indexName}`
        : `${indexName} value ${value} does not denote a position`
    );
    this.name = "IndexConversionError";
  }
}

export type TryReserveErrorKind = "capacity-overflow" | "alloc-error";

/**
 * Returned by `tryReserve`.
 *
 * - "capacity-overflow": the requested length exceeds what the list's index type can
 * address. This is a structural limit that holds regardless of available memory.
 * - "alloc-error": the engine refused the allocation. The original error is kept as `cause`.
 */
export class TryReserveError extends Error {
  constructor(readonly kind: TryReserveErrorKind, cause?: unknown) {
    super(
      kind === "capacity-overflow"
        ? "capacity overflow"
        : "memory allocation failed",
      { cause }
    );
    this.name = "TryReserveError";
  }
}

/**
 * Thrown when a cursor, iterator or {@link PayloadRef} is used after its list was
 * structurally modified (an entry was added, removed or relocated).
 */
export class BorrowError extends Error {
  constructor(what: string) {
    super(`${what} used after its list was structurally modified`);
    this.name = "BorrowError";
  }
}
