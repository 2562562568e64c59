/**
 * Core type system module.
 */

export type { ColumnKind, Policy, Scalar, StorageType } from './kind';
export { COLUMN_KINDS, POLICIES, isColumnKind, isPolicy, isScalar } from './kind';
export {
  inferKind,
  kindOf,
  toBoolean,
  toNumber,
  toScalars,
  toText,
  widen,
} from './inference';
