import type { TableDescription } from './interface';
import type { Table } from './table';

/**
 * Metadata query for printers and other collaborators: column names and
 * kinds in order, row count and policy.
 */
export function describe(table: Table): TableDescription {
  return {
    names: [...table._names],
    kinds: table._columns.map((c) => c.kind),
    rowCount: table.rowCount,
    policy: table.policy,
  };
}
