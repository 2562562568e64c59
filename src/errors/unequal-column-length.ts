import { DualframeError } from './base';

/**
 * Error thrown when a table is built from columns of differing length.
 */
export class UnequalColumnLengthError extends DualframeError {
  readonly column: string;
  readonly length: number;
  readonly expected: number;

  constructor(column: string, length: number, expected: number) {
    super('unequal column length', 'all columns must have the same length');
    this.name = 'UnequalColumnLengthError';
    this.column = column;
    this.length = length;
    this.expected = expected;
  }

  protected override _getExpression(): string {
    return 'Table.make(columns)';
  }

  protected override _getDetail(): string {
    return `column '${this.column}' has ${this.length} rows, expected ${this.expected}`;
  }
}
