import {
  err,
  IndexConversionError,
  ok,
  TryResult,
} from "./errors";
import { debugAssertionsEnabled } from "./internal/debug";

/**
 * The largest position (physical index) any index type can denote.
 *
 * Positions are plain numbers, but the library caps them at the 32-bit range,
 * so {@link Usize} (and every wider index type) tops out here.
 */
export const POSITION_MAX = 0xffff_ffff;

/**
 * The in-memory representation of an index value.
 * 8/16/32-bit integers use `number`; 64/128-bit integers use `bigint`.
 */
export type IndexRepr = number | bigint;

/**
 * A dense, zero-initialized column of integer cells, e.g. an `Int16Array`.
 */
export interface IntColumn<I extends IndexRepr> {
  readonly length: number;
  [index: number]: I;
}

/**
 * A fixed-width integer type: its range and how to allocate storage for it.
 */
export interface IntegerKind<I extends IndexRepr> {
  readonly name: string;
  readonly bits: number;
  readonly signed: boolean;
  readonly min: I;
  readonly max: I;
  readonly zero: I;
  allocate(length: number): IntColumn<I>;
  fromNumber(value: number): I;
  toNumber(value: I): number;
}

type NumberColumnConstructor = new (length: number) => IntColumn<number>;

class NumberKind implements IntegerKind<number> {
  readonly min: number;
  readonly max: number;
  readonly zero = 0;

  constructor(
    readonly name: string,
    readonly bits: 8 | 16 | 32,
    readonly signed: boolean,
    private readonly Column: NumberColumnConstructor
  ) {
    this.min = signed ? -(2 ** (bits - 1)) : 0;
    this.max = signed ? 2 ** (bits - 1) - 1 : 2 ** bits - 1;
  }

  allocate(length: number): IntColumn<number> {
    return new this.Column(length);
  }

  fromNumber(value: number): number {
    return value;
  }

  toNumber(value: number): number {
    return value;
  }
}

class BigIntKind implements IntegerKind<bigint> {
  readonly min: bigint;
  readonly max: bigint;
  readonly zero = 0n;

  constructor(
    readonly name: string,
    readonly bits: 64 | 128,
    readonly signed: boolean,
    private readonly allocateCells: (length: number) => IntColumn<bigint>
  ) {
    this.min = signed ? -(1n << BigInt(bits - 1)) : 0n;
    this.max = signed
      ? (1n << BigInt(bits - 1)) - 1n
      : (1n << BigInt(bits)) - 1n;
  }

  allocate(length: number): IntColumn<bigint> {
    return this.allocateCells(length);
  }

  fromNumber(value: number): bigint {
    return BigInt(value);
  }

  toNumber(value: bigint): number {
    return Number(value);
  }
}

// There is no 128-bit typed array; such cells are boxed bigints.
function allocateWide(length: number): IntColumn<bigint> {
  return new Array<bigint>(length).fill(0n);
}

export const IntegerKinds = {
  i8: new NumberKind("i8", 8, true, Int8Array),
  i16: new NumberKind("i16", 16, true, Int16Array),
  i32: new NumberKind("i32", 32, true, Int32Array),
  isize: new NumberKind("isize", 32, true, Int32Array),
  u8: new NumberKind("u8", 8, false, Uint8Array),
  u16: new NumberKind("u16", 16, false, Uint16Array),
  u32: new NumberKind("u32", 32, false, Uint32Array),
  usize: new NumberKind("usize", 32, false, Uint32Array),
  i64: new BigIntKind("i64", 64, true, (n) => new BigInt64Array(n)),
  u64: new BigIntKind("u64", 64, false, (n) => new BigUint64Array(n)),
  i128: new BigIntKind("i128", 128, true, allocateWide),
  u128: new BigIntKind("u128", 128, false, allocateWide),
} as const;

/**
 * A bounded index type: converts between an integer representation `I` and a
 * position (a non-negative `number`).
 *
 * Every StoreIndex can denote the positions `0..=maxPosition`, where `maxPosition` is
 * the smaller of its integer type's maximum and {@link POSITION_MAX}.
 *
 * There are two flavors with identical conversion behavior:
 * - Plain: any value of the integer type is valid. An absent link needs a separate
 * presence flag, costing one extra byte per entry.
 * - Sentinel-free ("NonMax"): the integer type's maximum bit pattern is not a valid index.
 * Storage reserves it to mean "no link", so absent links cost nothing extra.
 * `maxPosition` is one lower than the plain flavor's (unless both are capped by POSITION_MAX).
 *
 * Conversions come in three forms:
 * - `try*`: returns a {@link TryResult}, never throws.
 * - Plain (`toPosition`, `fromPosition`): throws {@link IndexConversionError} where
 * the `try*` form would fail.
 * - `*Unchecked`: trusted fast path. The caller guarantees the value came from a checked
 * conversion (or, for `fromPositionUnchecked`, that `position <= maxPosition`).
 * With debug assertions enabled it re-checks and throws; otherwise results for
 * out-of-range input are unspecified.
 */
export class StoreIndex<I extends IndexRepr> {
  readonly name: string;
  /**
   * The largest position this index type can denote.
   * A list using this index type holds at most `maxPosition + 1` entries.
   */
  readonly maxPosition: number;

  private constructor(
    readonly kind: IntegerKind<I>,
    readonly nonMax: boolean
  ) {
    this.name = nonMax
      ? "NonMax" + kind.name[0].toUpperCase() + kind.name.slice(1)
      : kind.name;
    const representable = kind.toNumber(kind.max) - (nonMax ? 1 : 0);
    this.maxPosition = Math.min(representable, POSITION_MAX);
  }

  static plain<I extends IndexRepr>(kind: IntegerKind<I>): StoreIndex<I> {
    return new StoreIndex<I>(kind, false);
  }

  static nonMax<I extends IndexRepr>(kind: IntegerKind<I>): StoreIndex<I> {
    return new StoreIndex<I>(kind, true);
  }

  /**
   * Nominal bytes of link storage per entry: two links of the integer's width,
   * plus one presence byte for plain index types.
   */
  get linkBytesPerEntry(): number {
    return 2 * (this.kind.bits / 8) + (this.nonMax ? 0 : 1);
  }

  tryFromPosition(position: number): TryResult<I, IndexConversionError> {
    if (
      !(
        Number.isSafeInteger(position) &&
        0 <= position &&
        position <= this.maxPosition
      )
    ) {
      return err(new IndexConversionError(position, this.name, "fromPosition"));
    }
    return ok(this.kind.fromNumber(position));
  }

  /**
   * @throws IndexConversionError If `position` is not in `[0, maxPosition]`.
   */
  fromPosition(position: number): I {
    const result = this.tryFromPosition(position);
    if (!result.ok) throw result.error;
    return result.value;
  }

  fromPositionUnchecked(position: number): I {
    if (debugAssertionsEnabled()) return this.fromPosition(position);
    return this.kind.fromNumber(position);
  }

  tryToPosition(index: I): TryResult<number, IndexConversionError> {
    const position = this.kind.toNumber(index);
    if (
      !(
        Number.isInteger(position) &&
        0 <= position &&
        position <= this.maxPosition
      )
    ) {
      return err(new IndexConversionError(index, this.name, "toPosition"));
    }
    return ok(position);
  }

  /**
   * @throws IndexConversionError If `index` does not denote a position.
   */
  toPosition(index: I): number {
    const result = this.tryToPosition(index);
    if (!result.ok) throw result.error;
    return result.value;
  }

  toPositionUnchecked(index: I): number {
    if (debugAssertionsEnabled()) return this.toPosition(index);
    return this.kind.toNumber(index);
  }

  toString(): string {
    return this.name;
  }
}

export const I8 = StoreIndex.plain(IntegerKinds.i8);
export const I16 = StoreIndex.plain(IntegerKinds.i16);
export const I32 = StoreIndex.plain(IntegerKinds.i32);
export const I64 = StoreIndex.plain(IntegerKinds.i64);
export const I128 = StoreIndex.plain(IntegerKinds.i128);
export const Isize = StoreIndex.plain(IntegerKinds.isize);
export const U8 = StoreIndex.plain(IntegerKinds.u8);
export const U16 = StoreIndex.plain(IntegerKinds.u16);
export const U32 = StoreIndex.plain(IntegerKinds.u32);
export const U64 = StoreIndex.plain(IntegerKinds.u64);
export const U128 = StoreIndex.plain(IntegerKinds.u128);
export const Usize = StoreIndex.plain(IntegerKinds.usize);

export const NonMaxI8 = StoreIndex.nonMax(IntegerKinds.i8);
export const NonMaxI16 = StoreIndex.nonMax(IntegerKinds.i16);
export const NonMaxI32 = StoreIndex.nonMax(IntegerKinds.i32);
export const NonMaxI64 = StoreIndex.nonMax(IntegerKinds.i64);
export const NonMaxI128 = StoreIndex.nonMax(IntegerKinds.i128);
export const NonMaxIsize = StoreIndex.nonMax(IntegerKinds.isize);
export const NonMaxU8 = StoreIndex.nonMax(IntegerKinds.u8);
export const NonMaxU16 = StoreIndex.nonMax(IntegerKinds.u16);
export const NonMaxU32 = StoreIndex.nonMax(IntegerKinds.u32);
export const NonMaxU64 = StoreIndex.nonMax(IntegerKinds.u64);
export const NonMaxU128 = StoreIndex.nonMax(IntegerKinds.u128);
export const NonMaxUsize = StoreIndex.nonMax(IntegerKinds.usize);
