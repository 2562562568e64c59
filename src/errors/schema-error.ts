import { DualframeError } from './base';

/**
 * Error thrown when column names or values cannot form a valid table.
 */
export class SchemaError extends DualframeError {
  private _detail: string;

  constructor(detail: string, hint?: string) {
    super('schema error', hint);
    this.name = 'SchemaError';
    this._detail = detail;
  }

  protected override _getExpression(): string {
    return 'table definition';
  }

  protected override _getDetail(): string {
    return this._detail;
  }
}
