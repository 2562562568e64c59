import { DualframeWarning } from './base';

/**
 * Table operator a column lookup went through.
 */
export type AccessOperation = 'col' | 'select' | 'subset' | 'extract';

/**
 * Returned (never thrown) when a strict table cannot resolve a column name.
 */
export class MissingColumnWarning extends DualframeWarning {
  readonly operation: AccessOperation;
  readonly columns: string[];
  readonly available: string[];

  constructor(operation: AccessOperation, columns: string[], available: string[]) {
    const hint =
      available.length > 0
        ? `available columns are: ${available.map((c) => `'${c}'`).join(', ')}`
        : 'table has no columns';

    super('unknown or uninitialised column', hint);
    this.name = 'MissingColumnWarning';
    this.operation = operation;
    this.columns = columns;
    this.available = available;
  }

  protected override _getExpression(): string {
    const quoted = this.columns.map((c) => `'${c}'`);
    const key = quoted.length === 1 ? quoted[0] : `[${quoted.join(', ')}]`;

    switch (this.operation) {
      case 'subset':
        return `table.subset(rows, ${key})`;
      default:
        return `table.${this.operation}(${key})`;
    }
  }

  protected override _getDetail(): string {
    if (this.columns.length === 1) {
      return `column '${this.columns[0]}' does not exist in table`;
    }
    return `columns ${this.columns.map((c) => `'${c}'`).join(', ')} do not exist in table`;
  }
}
