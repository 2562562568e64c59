import { SchemaError, UnequalColumnLengthError } from '../../errors';
import { ColumnVector } from '../vector';
import type { ColumnInput, ColumnSource, TableParts } from './interface';

/**
 * Rejects empty and repeated column names.
 */
export function checkNames(names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (typeof name !== 'string' || name.length === 0) {
      throw new SchemaError('table contains an empty column name', 'every column needs a name');
    }
    if (seen.has(name)) {
      throw new SchemaError(
        `table contains duplicate column name: ${name}`,
        'column names must be unique',
      );
    }
    seen.add(name);
  }
}

/**
 * Converts a column input to a vector, inferring the kind of plain arrays.
 */
export function toVector(input: ColumnInput): ColumnVector {
  return input instanceof ColumnVector ? input : ColumnVector.from(input);
}

/**
 * Flattens any column source into ordered parts, checking that names are
 * unique and every column has the same length.
 */
export function normalizeColumns(source: ColumnSource): TableParts {
  const entries = toEntries(source);
  const names = entries.map(([name]) => name);
  checkNames(names);

  const columns: ColumnVector[] = [];
  let rowCount = 0;

  for (let i = 0; i < entries.length; i++) {
    const [name, input] = entries[i];
    const column = toVector(input);

    if (i === 0) {
      rowCount = column.length;
    } else if (column.length !== rowCount) {
      throw new UnequalColumnLengthError(name, column.length, rowCount);
    }
    columns.push(column);
  }

  return { names, columns, rowCount };
}

/**
 * Legacy names for a selection that repeats columns: later copies get
 * `.1`, `.2`, ... appended, skipping names already in use.
 */
export function makeUnique(names: readonly string[]): string[] {
  const taken = new Set(names);
  const seen = new Set<string>();
  const counters = new Map<string, number>();

  return names.map((name) => {
    if (!seen.has(name)) {
      seen.add(name);
      return name;
    }

    let n = counters.get(name) ?? 0;
    let candidate: string;
    do {
      n += 1;
      candidate = `${name}.${n}`;
    } while (seen.has(candidate) || taken.has(candidate));

    counters.set(name, n);
    seen.add(candidate);
    return candidate;
  });
}

function toEntries(source: ColumnSource): (readonly [string, ColumnInput])[] {
  if (isColumnMap(source)) return [...source.entries()];
  if (isPairList(source)) return [...source];
  return Object.entries(source);
}

function isColumnMap(source: ColumnSource): source is ReadonlyMap<string, ColumnInput> {
  return source instanceof Map;
}

function isPairList(source: ColumnSource): source is ReadonlyArray<readonly [string, ColumnInput]> {
  return Array.isArray(source);
}
