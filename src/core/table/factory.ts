import type { Policy } from '../types';
import type { ColumnSource } from './interface';
import { Table } from './table';

/**
 * Column-major constructor. See {@link Table.make}.
 */
export function makeContainer(columns: ColumnSource, policy?: Policy): Table {
  return Table.make(columns, policy);
}

/**
 * Row-major constructor; the result is always strict. See {@link Table.fromRows}.
 */
export function makeFromRows(names: readonly string[], values: readonly unknown[]): Table {
  return Table.fromRows(names, values);
}
