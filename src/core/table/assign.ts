import { LengthMismatchError, RecycleLengthWarning, SchemaError } from '../../errors';
import { reportWarning } from '../../utils/warnings';
import { toVector } from './columns';
import type { Assignment, ColumnInput } from './interface';
import type { Table } from './table';

/**
 * Column assignment (`table$name <- source`).
 *
 * Returns a new table version with the column replaced in place, or
 * appended when the name is new; the receiver is never touched and every
 * other column is shared with it. The name must match exactly.
 *
 * The source fills the row count (or sets it, on a table with no columns):
 * - legacy recycles any length dividing the row count; other lengths are
 *   not applied and come back with a RecycleLengthWarning
 * - strict takes a single value or an exact fit
 *
 * @throws LengthMismatchError when a strict table cannot take the source
 * @throws SchemaError for an empty name
 */
export function assignColumn(table: Table, name: string, source: ColumnInput): Assignment {
  if (name.length === 0) {
    throw new SchemaError('cannot assign a column without a name', 'pass a non-empty name');
  }

  const vector = toVector(source);
  const targetLength = table._columns.length === 0 ? vector.length : table.rowCount;
  const recycled = vector.recycle(targetLength, table.policy);

  if (!recycled.ok) {
    if (table.policy === 'strict') {
      throw new LengthMismatchError(name, vector.length, targetLength);
    }
    const warning = reportWarning(new RecycleLengthWarning(name, vector.length, targetLength));
    return { table, applied: false, warning };
  }

  const names = [...table._names];
  const columns = [...table._columns];
  const existing = names.indexOf(name);

  if (existing === -1) {
    names.push(name);
    columns.push(recycled.data);
  } else {
    columns[existing] = recycled.data;
  }

  return { table: table._derive(names, columns, targetLength), applied: true };
}
