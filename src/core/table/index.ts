/**
 * Table module.
 * Provides the policy-tagged table and its access operators.
 */

export { Table } from './table';
export { makeContainer, makeFromRows } from './factory';
export { doubleBracket, nameAccess, rowColBracket, singleBracket } from './access';
export { assignColumn } from './assign';
export { describe } from './describe';
export { resolve, resolveOne } from './resolver';
export type { Arity, NotFound } from './resolver';
export type {
  Assignment,
  ColumnInput,
  ColumnKey,
  ColumnSource,
  KeySet,
  Lookup,
  Row,
  RowSelector,
  TableDescription,
} from './interface';
