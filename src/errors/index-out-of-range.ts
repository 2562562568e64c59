import { DualframeError } from './base';

/**
 * Error thrown when a 1-based position falls outside its collection.
 */
export class IndexOutOfRangeError extends DualframeError {
  readonly position: number;
  readonly size: number;
  readonly target: 'column' | 'row' | 'element';

  constructor(position: number, size: number, target: 'column' | 'row' | 'element') {
    const hint = size > 0 ? `valid range is 1 to ${size}` : `there are no ${target}s`;

    super('index out of range', hint);
    this.name = 'IndexOutOfRangeError';
    this.position = position;
    this.size = size;
    this.target = target;
  }

  protected override _getExpression(): string {
    return `${this.target}[${this.position}]`;
  }

  protected override _getDetail(): string {
    return `${this.target} position ${this.position} is outside the valid range`;
  }
}
