import { DualframeError } from './base';

/**
 * Error thrown when a strict table is assigned a column it cannot broadcast.
 */
export class LengthMismatchError extends DualframeError {
  readonly column: string;
  readonly sourceLength: number;
  readonly targetLength: number;

  constructor(column: string, sourceLength: number, targetLength: number) {
    super('length mismatch', `only values of size ${targetLength} or 1 can be assigned`);
    this.name = 'LengthMismatchError';
    this.column = column;
    this.sourceLength = sourceLength;
    this.targetLength = targetLength;
  }

  protected override _getExpression(): string {
    return `table.assign('${this.column}', ...)`;
  }

  protected override _getDetail(): string {
    return `assigned data has ${this.sourceLength} values, table has ${this.targetLength} rows`;
  }
}
