import { InvalidIndexError, SchemaError } from '../../errors';
import { toOffset, toOffsets } from '../../utils/positions';
import type { Scalar } from '../types';
import { ColumnVector } from '../vector';
import { makeUnique } from './columns';
import type { KeySet, Lookup, RowSelector } from './interface';
import { type NotFound, resolve, resolveOne, toKeyList } from './resolver';
import type { Table } from './table';

/**
 * Name access (`table$name`).
 *
 * Legacy tables accept a unique name prefix and miss silently; strict
 * tables need the exact name and attach a warning to a miss.
 */
export function nameAccess(table: Table, name: string): Lookup<ColumnVector> {
  const found = resolveOne(table, name, 'single', 'col');
  if (!found.ok) return miss(found.error);
  return { value: table._columns[found.data] };
}

/**
 * Single bracket (`table[key]`).
 *
 * Always a table, however many columns are picked, under both policies.
 * Repeating a column renames the copies under legacy and is an error under
 * strict.
 *
 * @throws SchemaError when a strict selection repeats a column
 */
export function singleBracket(table: Table, key: KeySet): Lookup<Table> {
  const resolved = resolve(table, key, 'single', 'select');
  if (!resolved.ok) return miss(resolved.error);
  return { value: pick(table, resolved.data, undefined) };
}

/**
 * Row/column bracket (`table[rows, key]`).
 *
 * The row selector is applied as given to every picked column. Legacy
 * drops a single resulting column to its vector; strict always keeps the
 * table. An omitted key picks every column.
 *
 * @throws IndexOutOfRangeError for a row outside the table
 */
export function rowColBracket(
  table: Table,
  rows: RowSelector,
  key?: KeySet | null,
): Lookup<Table | ColumnVector> {
  let indices: number[];
  if (key === undefined || key === null) {
    indices = table._columns.map((_, i) => i);
  } else {
    const resolved = resolve(table, key, 'single', 'subset');
    if (!resolved.ok) return miss(resolved.error);
    indices = resolved.data;
  }

  const subset = pick(table, indices, toRowPositions(rows));

  switch (table.policy) {
    case 'legacy':
      if (indices.length === 1) return { value: subset._columns[0] };
      return { value: subset };
    case 'strict':
      return { value: subset };
  }
}

/**
 * Double bracket (`table[[key]]`).
 *
 * A single name or position gives the whole column under both policies;
 * names match exactly. A compound key is chained under legacy: the first
 * member picks the column and each later position picks an element out of
 * the previous result. Strict rejects compound keys.
 *
 * @throws InvalidIndexError for an empty key, a strict compound key, or a
 *   name after the first member of a chain
 * @throws IndexOutOfRangeError for a chained position out of range
 */
export function doubleBracket(table: Table, key: KeySet): Lookup<ColumnVector | Scalar> {
  const keys = toKeyList(key);
  if (keys.length === 0) {
    throw new InvalidIndexError('extract', 'needs a name or position', 'pass one column key');
  }

  if (keys.length > 1 && table.policy === 'strict') {
    throw new InvalidIndexError(
      'extract',
      `takes a single name or position, got ${keys.length} keys`,
      'use select() to pick several columns',
    );
  }

  const [first, ...rest] = keys;
  const found = resolveOne(table, first, 'double', 'extract');
  if (!found.ok) return miss(found.error);

  let current: ColumnVector | Scalar = table._columns[found.data];
  for (const position of rest) {
    if (typeof position !== 'number') {
      throw new InvalidIndexError(
        'extract',
        `takes positions after the first key, got '${position}'`,
        'elements inside a column are addressed by 1-based position',
      );
    }
    current =
      current instanceof ColumnVector ? current.at(position) : chainScalar(current, position);
  }

  return { value: current };
}

// Internal
// ===============================================================

function miss(notFound: NotFound): Lookup<never> {
  if (notFound.warning) return { value: null, warning: notFound.warning };
  return { value: null };
}

/**
 * A scalar behaves as a length-1 vector inside a chain.
 */
function chainScalar(value: Scalar, position: number): Scalar {
  toOffset(position, 1, 'element');
  return value;
}

function toRowPositions(rows: RowSelector): readonly number[] | undefined {
  if (rows === null || rows === undefined) return undefined;
  return typeof rows === 'number' ? [rows] : rows;
}

/**
 * Builds a table of the given columns and rows, keeping the receiver's
 * policy. Unchanged columns are shared, not copied.
 */
function pick(table: Table, indices: readonly number[], rows: readonly number[] | undefined): Table {
  const names = indices.map((i) => table._names[i]);

  let rowCount = table.rowCount;
  if (rows !== undefined) {
    rowCount = toOffsets(rows, table.rowCount, 'row').length;
  }

  const columns = indices.map((i) => {
    const column = table._columns[i];
    return rows === undefined ? column : column.take(rows);
  });

  return table._derive(uniqueNames(table, names), columns, rowCount);
}

function uniqueNames(table: Table, names: string[]): string[] {
  switch (table.policy) {
    case 'legacy':
      return makeUnique(names);
    case 'strict': {
      const seen = new Set<string>();
      for (const name of names) {
        if (seen.has(name)) {
          throw new SchemaError(
            `column '${name}' is selected more than once`,
            'column names must be unique',
          );
        }
        seen.add(name);
      }
      return names;
    }
  }
}
