import { DualframeWarning } from './base';

/**
 * Returned by a legacy assignment whose source length does not divide the
 * row count. The assignment is not applied.
 */
export class RecycleLengthWarning extends DualframeWarning {
  readonly column: string;
  readonly sourceLength: number;
  readonly targetLength: number;

  constructor(column: string, sourceLength: number, targetLength: number) {
    super(
      'replacement length does not divide row count',
      `use a length that divides ${targetLength}; the table was left unchanged`,
    );
    this.name = 'RecycleLengthWarning';
    this.column = column;
    this.sourceLength = sourceLength;
    this.targetLength = targetLength;
  }

  protected override _getExpression(): string {
    return `table.assign('${this.column}', ...)`;
  }

  protected override _getDetail(): string {
    return `replacement has ${this.sourceLength} values, data has ${this.targetLength}`;
  }
}
