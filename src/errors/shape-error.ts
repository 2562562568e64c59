import { DualframeError } from './base';

/**
 * Error thrown when row-major values do not fill whole rows.
 */
export class ShapeError extends DualframeError {
  readonly valueCount: number;
  readonly columnCount: number;

  constructor(valueCount: number, columnCount: number) {
    const hint =
      columnCount > 0
        ? `value count must be a multiple of ${columnCount}`
        : 'name at least one column before giving values';

    super('shape error', hint);
    this.name = 'ShapeError';
    this.valueCount = valueCount;
    this.columnCount = columnCount;
  }

  protected override _getExpression(): string {
    return 'Table.fromRows(names, values)';
  }

  protected override _getDetail(): string {
    return `${this.valueCount} values cannot be split into rows of ${this.columnCount} columns`;
  }
}
