import { ShapeError } from '../../errors';
import { type Scalar, inferKind, toScalars } from '../types';
import { ColumnVector } from '../vector';
import { checkNames } from './columns';
import type { TableParts } from './interface';

/**
 * Splits a flat, row-major value list into columns.
 *
 * Names are column tokens; one leading `~` is dropped, so `'~x'` and `'x'`
 * name the same column. Each column takes every C-th value from its own
 * offset and gets the narrowest kind holding all of them.
 *
 * @throws ShapeError when the values do not fill whole rows
 * @throws SchemaError for empty or repeated names and unsupported values
 */
export function buildFromRows(tokens: readonly string[], values: readonly unknown[]): TableParts {
  const names = tokens.map(stripTilde);
  checkNames(names);

  const width = names.length;
  if (width === 0) {
    if (values.length > 0) throw new ShapeError(values.length, 0);
    return { names, columns: [], rowCount: 0 };
  }
  if (values.length % width !== 0) {
    throw new ShapeError(values.length, width);
  }

  const scalars = toScalars(values);
  const rowCount = scalars.length / width;
  const columns: ColumnVector[] = [];

  for (let p = 0; p < width; p++) {
    const gathered: Scalar[] = [];
    for (let i = p; i < scalars.length; i += width) {
      gathered.push(scalars[i]);
    }
    columns.push(ColumnVector.of(inferKind(gathered), gathered));
  }

  return { names, columns, rowCount };
}

function stripTilde(token: string): string {
  return token.startsWith('~') ? token.slice(1) : token;
}
