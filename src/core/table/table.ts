import { SchemaError } from '../../errors';
import { toOffset } from '../../utils/positions';
import { getConfig } from '../config';
import { type Policy, type Scalar, isPolicy } from '../types';
import type { ColumnVector } from '../vector';
import { doubleBracket, nameAccess, rowColBracket, singleBracket } from './access';
import { assignColumn } from './assign';
import { normalizeColumns } from './columns';
import { describe } from './describe';
import type {
  Assignment,
  ColumnInput,
  ColumnSource,
  KeySet,
  Lookup,
  Row,
  RowSelector,
  TableDescription,
} from './interface';
import { buildFromRows } from './row-builder';

/**
 * Table - an immutable, ordered collection of equal-length named columns
 * tagged with an indexing policy.
 *
 * Every accessor reads the receiver and returns a column, a new table or a
 * missing-value outcome. Nothing here mutates: `assign` hands back a new
 * version and callers rebind to see it.
 *
 * @example
 * ```ts
 * const legacy = Table.make({ values: [1, 2, 3], labels: ['a', 'b', 'c'] }, 'legacy');
 * legacy.col('val').value;        // values column, by unique prefix
 * legacy.subset(null, 'labels');  // the labels vector itself
 *
 * const strict = legacy.withPolicy('strict');
 * strict.col('val').warning;      // MissingColumnWarning
 * strict.subset(null, 'labels');  // a one-column table
 * ```
 */
export class Table {
  readonly policy: Policy;
  readonly rowCount: number;

  /** @internal */
  readonly _names: readonly string[];
  /** @internal */
  readonly _columns: readonly ColumnVector[];

  /**
   * Private constructor - use factory methods instead.
   */
  private constructor(
    names: readonly string[],
    columns: readonly ColumnVector[],
    rowCount: number,
    policy: Policy,
  ) {
    this._names = Object.freeze([...names]);
    this._columns = Object.freeze([...columns]);
    this.rowCount = rowCount;
    this.policy = policy;
  }

  // Factory Methods
  // ===============================================================

  /**
   * Creates a table from columns in order.
   * Plain arrays have their kind inferred.
   *
   * @throws UnequalColumnLengthError if columns differ in length
   * @throws SchemaError for empty or repeated names
   */
  static make(source: ColumnSource, policy: Policy = getConfig().defaultPolicy): Table {
    if (!isPolicy(policy)) {
      throw new SchemaError(
        `unknown policy '${String(policy)}'`,
        "policy must be 'legacy' or 'strict'",
      );
    }
    const { names, columns, rowCount } = normalizeColumns(source);
    return new Table(names, columns, rowCount, policy);
  }

  /**
   * Creates a strict table from column tokens and row-major values.
   *
   * @example
   * ```ts
   * const t = Table.fromRows(['~letters', '~numbers'], ['a', 1, 'b', 2, 'c', 3]);
   * t.describe(); // { names: ['letters', 'numbers'], kinds: ['string', 'int32'], rowCount: 3, policy: 'strict' }
   * ```
   *
   * @throws ShapeError when the values do not fill whole rows
   */
  static fromRows(names: readonly string[], values: readonly unknown[]): Table {
    const parts = buildFromRows(names, values);
    return new Table(parts.names, parts.columns, parts.rowCount, 'strict');
  }

  /**
   * Creates a table with the same policy as this one (internal use).
   * @internal
   */
  _derive(names: readonly string[], columns: readonly ColumnVector[], rowCount: number): Table {
    return new Table(names, columns, rowCount, this.policy);
  }

  // Metadata
  // ===============================================================

  /**
   * Column names in order.
   */
  get names(): string[] {
    return [...this._names];
  }

  get columnCount(): number {
    return this._columns.length;
  }

  get shape(): readonly [rows: number, cols: number] {
    return [this.rowCount, this._columns.length] as const;
  }

  describe(): TableDescription {
    return describe(this);
  }

  /**
   * Gets a column by 1-based position.
   *
   * @throws IndexOutOfRangeError outside 1..columnCount
   */
  column(position: number): ColumnVector {
    return this._columns[toOffset(position, this._columns.length, 'column')];
  }

  // Access Operators (delegated to access.ts / assign.ts)
  // ===============================================================

  /**
   * Name access, `table$name`.
   */
  col(name: string): Lookup<ColumnVector> {
    return nameAccess(this, name);
  }

  /**
   * Single bracket, `table[key]`. Always a table.
   */
  select(key: KeySet): Lookup<Table> {
    return singleBracket(this, key);
  }

  /**
   * Row/column bracket, `table[rows, key]`.
   */
  subset(rows: RowSelector, key?: KeySet | null): Lookup<Table | ColumnVector> {
    return rowColBracket(this, rows, key);
  }

  /**
   * Double bracket, `table[[key]]`.
   */
  extract(key: KeySet): Lookup<ColumnVector | Scalar> {
    return doubleBracket(this, key);
  }

  /**
   * Column assignment, `table$name <- source`. Returns the new version.
   */
  assign(name: string, source: ColumnInput): Assignment {
    return assignColumn(this, name, source);
  }

  // Conversion
  // ===============================================================

  /**
   * Same columns under another policy.
   */
  withPolicy(policy: Policy): Table {
    if (policy === this.policy) return this;
    return new Table(this._names, this._columns, this.rowCount, policy);
  }

  /**
   * Iterate over rows as plain objects.
   */
  *rows(): IterableIterator<Row> {
    for (let r = 0; r < this.rowCount; r++) {
      const row: Row = {};
      this._names.forEach((name, i) => {
        row[name] = this._columns[i].at(r + 1);
      });
      yield row;
    }
  }

  /**
   * Convert to an array of row objects.
   */
  toArray(): Row[] {
    return [...this.rows()];
  }

  /**
   * Same policy, row count, names, kinds and values.
   */
  equals(other: Table): boolean {
    if (other === this) return true;
    if (other.policy !== this.policy || other.rowCount !== this.rowCount) return false;
    if (other._names.length !== this._names.length) return false;

    return this._names.every(
      (name, i) => other._names[i] === name && other._columns[i].equals(this._columns[i]),
    );
  }
}
