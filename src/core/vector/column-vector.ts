import { SchemaError } from '../../errors';
import { type Result, err, ok } from '../../types/result';
import { toOffset, toOffsets } from '../../utils/positions';
import type { ColumnKind, Policy, Scalar } from '../types';
import { COLUMN_KINDS, inferKind, isColumnKind, toScalars } from '../types';
import { type RecycleRejection, canRecycle, recycleOffsets } from './recycle';
import { type ColumnStorage, createStorageFrom, gatherStorage, readStorage } from './storage';

/**
 * ColumnVector - an immutable, homogeneous, fixed-length column.
 *
 * Wraps a TypedArray for booleans and numbers and a frozen array for text.
 * The storage never leaves the vector; readers get copies.
 *
 * @example
 * ```ts
 * const scores = ColumnVector.float64([9.5, 7.25, 8]);
 * scores.at(1); // 9.5
 * scores.kind;  // 'float64'
 * ```
 */
export class ColumnVector implements Iterable<Scalar> {
  readonly length: number;

  private readonly _storage: ColumnStorage;

  /**
   * Private constructor - use factory methods instead.
   */
  private constructor(storage: ColumnStorage) {
    this._storage = storage;
    this.length = storage.data.length;
  }

  // ─────────────────────────────────────────────────────────────
  // Factory Methods
  // ─────────────────────────────────────────────────────────────

  /**
   * Creates a boolean column.
   */
  static bool(data: readonly boolean[]): ColumnVector {
    return new ColumnVector(createStorageFrom('bool', data));
  }

  /**
   * Creates an integer column. Fractions are truncated toward zero and
   * values outside the 32-bit range wrap.
   */
  static int32(data: readonly number[] | Int32Array): ColumnVector {
    if (data instanceof Int32Array) {
      return new ColumnVector({ kind: 'int32', data: Int32Array.from(data) });
    }
    return new ColumnVector(createStorageFrom('int32', data));
  }

  /**
   * Creates a floating-point column.
   */
  static float64(data: readonly number[] | Float64Array): ColumnVector {
    return new ColumnVector({ kind: 'float64', data: Float64Array.from(data) });
  }

  /**
   * Creates a text column.
   */
  static string(data: readonly string[]): ColumnVector {
    return new ColumnVector({ kind: 'string', data: Object.freeze([...data]) });
  }

  /**
   * Creates a column of an explicit kind, coercing every value into it.
   *
   * The coercion is lossy. `int32` truncates fractions and wraps values
   * outside the 32-bit range the way `Int32Array` does (`3e9` is stored as
   * `-1294967296`). Text that does not parse as a number becomes `0` in a
   * numeric column. Use {@link ColumnVector.from} to keep every value.
   *
   * @throws SchemaError for an unknown kind
   */
  static of(kind: ColumnKind, values: readonly Scalar[]): ColumnVector {
    if (!isColumnKind(kind)) {
      throw new SchemaError(
        `unknown column kind '${String(kind)}'`,
        `kind must be one of ${COLUMN_KINDS.join(', ')}`,
      );
    }
    return new ColumnVector(createStorageFrom(kind, values));
  }

  /**
   * Creates a column whose kind is inferred from the values.
   *
   * @throws SchemaError if a value is not a boolean, number or string
   */
  static from(values: readonly unknown[]): ColumnVector {
    const scalars = toScalars(values);
    return ColumnVector.of(inferKind(scalars), scalars);
  }

  // ─────────────────────────────────────────────────────────────
  // Element Access
  // ─────────────────────────────────────────────────────────────

  get kind(): ColumnKind {
    return this._storage.kind;
  }

  /**
   * Gets the element at a 1-based position.
   *
   * @throws IndexOutOfRangeError outside 1..length
   */
  at(position: number): Scalar {
    return readStorage(this._storage, toOffset(position, this.length, 'element'));
  }

  /**
   * Gets the element at a 0-based offset.
   * Returns undefined for out-of-bounds access.
   */
  get(offset: number): Scalar | undefined {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.length) {
      return undefined;
    }
    return readStorage(this._storage, offset);
  }

  /**
   * Gathers 1-based positions into a new column of the same kind.
   * Positions may repeat and come in any order.
   */
  take(positions: readonly number[]): ColumnVector {
    return this._gather(toOffsets(positions, this.length, 'row'));
  }

  // ─────────────────────────────────────────────────────────────
  // Recycling
  // ─────────────────────────────────────────────────────────────

  /**
   * Repeats this column cyclically to the target length.
   *
   * Legacy takes any length dividing the target; strict takes a single
   * value or an exact fit. Anything else is rejected without building a
   * partial column.
   */
  recycle(targetLength: number, policy: Policy): Result<ColumnVector, RecycleRejection> {
    if (!canRecycle(this.length, targetLength, policy)) {
      return err({ policy, sourceLength: this.length, targetLength });
    }
    if (this.length === targetLength) return ok(this);
    return ok(this._gather(recycleOffsets(this.length, targetLength)));
  }

  // ─────────────────────────────────────────────────────────────
  // Iteration & Conversion
  // ─────────────────────────────────────────────────────────────

  *[Symbol.iterator](): Iterator<Scalar> {
    for (let i = 0; i < this.length; i++) {
      yield readStorage(this._storage, i);
    }
  }

  /**
   * Convert to a plain array.
   */
  toArray(): Scalar[] {
    return [...this];
  }

  /**
   * Same kind, same length and same values. NaN equals NaN.
   */
  equals(other: ColumnVector): boolean {
    if (other === this) return true;
    if (other.kind !== this.kind || other.length !== this.length) return false;

    for (let i = 0; i < this.length; i++) {
      const a = readStorage(this._storage, i);
      const b = readStorage(other._storage, i);
      if (a !== b && !(Number.isNaN(a) && Number.isNaN(b))) return false;
    }
    return true;
  }

  toString(): string {
    return `<${this.kind}[${this.length}]> ${this.toArray().map(String).join(' ')}`;
  }

  // Internal
  // ===============================================================

  private _gather(offsets: readonly number[]): ColumnVector {
    return new ColumnVector(gatherStorage(this._storage, offsets));
  }
}
