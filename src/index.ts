/**
 * dualframe - tables with two indexing profiles.
 *
 * A `legacy` table partially matches names, drops single columns to
 * vectors and recycles assignments. A `strict` table wants exact names,
 * always keeps its shape and only broadcasts single values.
 *
 * @example
 * ```ts
 * import { Table, ColumnVector } from 'dualframe';
 *
 * const t = Table.make({ values: [1, 2, 3, 4], letters: ['a', 'b', 'c', 'd'] }, 'legacy');
 * t.col('val').value;                   // values column, by unique prefix
 * t.extract([1, 3]).value;              // 3: column 1, then element 3
 * const next = t.assign('flag', [true, false]).table; // recycled to 4 rows
 *
 * const s = Table.fromRows(['~letters', '~numbers'], ['a', 1, 'b', 2]);
 * s.policy;                             // 'strict'
 * s.subset([1], 'numbers').value;       // a one-column, one-row table
 * ```
 */

// Core type system
export { COLUMN_KINDS, POLICIES, inferKind, isColumnKind, isPolicy } from './core/types';
export type { ColumnKind, Policy, Scalar } from './core/types';

// Data structures
export { ColumnVector } from './core/vector';
export type { RecycleRejection } from './core/vector';

export {
  Table,
  assignColumn,
  describe,
  doubleBracket,
  makeContainer,
  makeFromRows,
  nameAccess,
  resolve,
  rowColBracket,
  singleBracket,
} from './core/table';
export type {
  Arity,
  Assignment,
  ColumnInput,
  ColumnKey,
  ColumnSource,
  KeySet,
  Lookup,
  NotFound,
  Row,
  RowSelector,
  TableDescription,
} from './core/table';

// Configuration
export { configure, getConfig, getDefaultConfig, resetConfig } from './core/config';
export type { TableConfig } from './core/config';

// Result helpers
export { err, ok, unwrap, unwrapErr } from './types/result';
export type { Result } from './types/result';

// Errors
export {
  DualframeError,
  DualframeWarning,
  IndexOutOfRangeError,
  InvalidIndexError,
  LengthMismatchError,
  MissingColumnWarning,
  RecycleLengthWarning,
  SchemaError,
  ShapeError,
  UnequalColumnLengthError,
} from './errors';
export type { AccessOperation } from './errors';
