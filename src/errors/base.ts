/**
 * Stack frames from dependencies or this library. The reported location is
 * the first frame outside them, in the caller's code.
 */
const LIBRARY_FRAMES = ['node_modules', '/src/errors/', '/src/core/', '/src/utils/'];

/**
 * Base class for every dualframe diagnostic.
 * Provides formatted output with location tracking and hints.
 *
 * Errors extending it are thrown; warnings extending it are returned
 * on an operator's result and never thrown.
 */
export class DualframeError extends Error {
  readonly hint?: string;
  readonly location?: { file: string; line: number; column: number };

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'DualframeError';
    this.hint = hint;
    this.location = this._extractLocation();
  }

  private _extractLocation(): { file: string; line: number; column: number } | undefined {
    const stack = this.stack;
    if (!stack) return undefined;

    const lines = stack.split('\n');
    for (const line of lines) {
      if (!line.trimStart().startsWith('at ')) continue;
      if (LIBRARY_FRAMES.some((frame) => line.includes(frame))) continue;

      const match =
        line.match(/at .+? \((.+?):(\d+):(\d+)\)/) || line.match(/at (.+?):(\d+):(\d+)/);

      if (match) {
        const [, file, lineNo, columnNo] = match;
        if (file === undefined || lineNo === undefined || columnNo === undefined) continue;
        return {
          file,
          line: Number.parseInt(lineNo, 10),
          column: Number.parseInt(columnNo, 10),
        };
      }
    }
    return undefined;
  }

  format(): string {
    const lines: string[] = [];

    const loc = this.location
      ? ` at ${this.location.file.split('/').slice(-1)[0]}:${this.location.line}:${this.location.column}`
      : '';

    lines.push(`${this._getSeverity()}: ${this.message}${loc}`);
    lines.push(`  --> ${this._getExpression()}`);
    lines.push('   |');
    lines.push(`   └── ${this._getDetail()}`);

    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }

    return lines.join('\n');
  }

  protected _getSeverity(): 'error' | 'warning' {
    return 'error';
  }

  protected _getExpression(): string {
    return '(expression)';
  }

  protected _getDetail(): string {
    return this.message;
  }
}

/**
 * Soft diagnostic attached to an operator's outcome.
 */
export class DualframeWarning extends DualframeError {
  constructor(message: string, hint?: string) {
    super(message, hint);
    this.name = 'DualframeWarning';
  }

  protected override _getSeverity(): 'error' | 'warning' {
    return 'warning';
  }
}
