import { DualframeError } from './base';

/**
 * Error thrown when a key has a shape the operator does not take.
 */
export class InvalidIndexError extends DualframeError {
  readonly operation: string;
  readonly reason: string;

  constructor(operation: string, reason: string, hint?: string) {
    super('invalid index', hint);
    this.name = 'InvalidIndexError';
    this.operation = operation;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return `${this.operation}(...)`;
  }

  protected override _getDetail(): string {
    return `'${this.operation}' ${this.reason}`;
  }
}
