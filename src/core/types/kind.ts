/**
 * Column kind identifiers.
 * Boolean, integer, floating-point and text columns.
 */
export type ColumnKind = 'bool' | 'int32' | 'float64' | 'string';

/**
 * A single cell value.
 */
export type Scalar = boolean | number | string;

/**
 * Indexing profile fixed on a table when it is created.
 *
 * - `legacy` partially matches names, drops single columns to vectors and
 *   recycles assignments.
 * - `strict` requires exact names, never drops dimensions and only
 *   broadcasts length-1 assignments.
 */
export type Policy = 'legacy' | 'strict';

export const POLICIES: readonly Policy[] = ['legacy', 'strict'];

export const COLUMN_KINDS: readonly ColumnKind[] = ['bool', 'int32', 'float64', 'string'];

/**
 * Backing storage of each ColumnKind.
 */
interface KindStorage {
  bool: Uint8Array;
  int32: Int32Array;
  float64: Float64Array;
  string: readonly string[];
}

export type StorageType<K extends ColumnKind> = KindStorage[K];

export function isPolicy(value: unknown): value is Policy {
  return POLICIES.some((policy) => policy === value);
}

export function isColumnKind(value: unknown): value is ColumnKind {
  return COLUMN_KINDS.some((kind) => kind === value);
}

export function isScalar(value: unknown): value is Scalar {
  const type = typeof value;
  return type === 'boolean' || type === 'number' || type === 'string';
}
