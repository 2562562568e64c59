import { SchemaError } from '../../errors';
import { type ColumnKind, type Scalar, isScalar } from './kind';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Position of each kind in the widening order bool < int32 < float64 < string.
 */
const KIND_RANK: Record<ColumnKind, number> = {
  bool: 0,
  int32: 1,
  float64: 2,
  string: 3,
};

/**
 * Narrowest kind able to hold a single value.
 */
export function kindOf(value: Scalar): ColumnKind {
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'string') return 'string';
  if (Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) return 'int32';
  return 'float64';
}

/**
 * Least general kind that holds values of both kinds.
 */
export function widen(a: ColumnKind, b: ColumnKind): ColumnKind {
  return KIND_RANK[a] >= KIND_RANK[b] ? a : b;
}

/**
 * Infers the narrowest common kind of a value sequence.
 * Numbers widen to the least general numeric kind present; any string
 * forces the whole sequence to text. An empty sequence is boolean.
 *
 * @throws SchemaError for values that are not booleans, numbers or strings
 */
export function inferKind(values: readonly unknown[]): ColumnKind {
  let kind: ColumnKind = 'bool';

  for (const value of values) {
    if (!isScalar(value)) {
      throw new SchemaError(
        `cannot infer column kind from value type: ${value === null ? 'null' : typeof value}`,
        'supported types: boolean, number, string',
      );
    }
    kind = widen(kind, kindOf(value));
    if (kind === 'string') break;
  }

  return kind;
}

/**
 * Narrows an unknown sequence to scalars.
 *
 * @throws SchemaError at the first value that is not a scalar
 */
export function toScalars(values: readonly unknown[]): Scalar[] {
  const result: Scalar[] = [];
  for (const value of values) {
    if (!isScalar(value)) {
      throw new SchemaError(
        `cannot store value of type ${value === null ? 'null' : typeof value} in a column`,
        'supported types: boolean, number, string',
      );
    }
    result.push(value);
  }
  return result;
}

export function toBoolean(value: Scalar): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  const s = value.toLowerCase();
  return s === 'true' || s === '1';
}

export function toNumber(value: Scalar): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return Number.parseFloat(value) || 0;
}

export function toText(value: Scalar): string {
  return String(value);
}
