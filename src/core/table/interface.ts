import type { MissingColumnWarning, RecycleLengthWarning } from '../../errors';
import type { ColumnKind, Policy, Scalar } from '../types';
import type { ColumnVector } from '../vector';
import type { Table } from './table';

/**
 * A column name or a 1-based column position.
 */
export type ColumnKey = string | number;

/**
 * A single key or an ordered set of keys.
 */
export type KeySet = ColumnKey | readonly ColumnKey[];

/**
 * Rows to keep: all of them (`null`/`undefined`), one 1-based position,
 * or an ordered list of positions.
 */
export type RowSelector = number | readonly number[] | null | undefined;

/**
 * Column data accepted by constructors and assignment.
 * Plain arrays have their kind inferred.
 */
export type ColumnInput = ColumnVector | readonly unknown[];

/**
 * Ordered columns for construction.
 * Plain records follow JavaScript property order.
 */
export type ColumnSource =
  | ReadonlyMap<string, ColumnInput>
  | ReadonlyArray<readonly [string, ColumnInput]>
  | Readonly<Record<string, ColumnInput>>;

/**
 * Outcome of a lookup that may miss.
 * A miss leaves `value` null; strict tables also attach a warning.
 */
export interface Lookup<T> {
  readonly value: T | null;
  readonly warning?: MissingColumnWarning;
}

/**
 * Outcome of a column assignment.
 * `table` is the new version, or the receiver itself when nothing applied.
 */
export interface Assignment {
  readonly table: Table;
  readonly applied: boolean;
  readonly warning?: RecycleLengthWarning;
}

/**
 * Metadata consumed by printers and other collaborators.
 */
export interface TableDescription {
  readonly names: string[];
  readonly kinds: ColumnKind[];
  readonly rowCount: number;
  readonly policy: Policy;
}

/**
 * One row as a plain object keyed by column name.
 */
export type Row = Record<string, Scalar>;

/**
 * Names, columns and row count of a table before it is tagged with a policy.
 */
export interface TableParts {
  readonly names: string[];
  readonly columns: ColumnVector[];
  readonly rowCount: number;
}
