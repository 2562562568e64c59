import { type AccessOperation, MissingColumnWarning } from '../../errors';
import { type Result, err, ok } from '../../types/result';
import { toOffset } from '../../utils/positions';
import { reportWarning } from '../../utils/warnings';
import type { Policy } from '../types';
import type { ColumnKey, KeySet } from './interface';
import type { Table } from './table';

/**
 * Operator context for a lookup.
 * `single` covers name access and both bracket forms; `double` is element
 * extraction, which only ever matches names exactly.
 */
export type Arity = 'single' | 'double';

/**
 * A lookup that did not resolve.
 */
export interface NotFound {
  /** Names that did not resolve, in request order */
  readonly keys: string[];
  /** Prefix matches seen for those names (two or more means ambiguous) */
  readonly candidates: string[];
  /** Attached under the strict policy only */
  readonly warning?: MissingColumnWarning;
}

type NameMatch = { found: true; index: number } | { found: false; candidates: string[] };

/**
 * Resolves a key or key set to 0-based column indices, in request order.
 *
 * Names match exactly first. Failing that, a legacy table in `single`
 * arity accepts the one column the key is a prefix of; no match or an
 * ambiguous prefix is a silent miss. Strict tables never prefix match and
 * attach a MissingColumnWarning to every miss.
 *
 * Positions are 1-based and behave the same under both policies.
 * `operation` names the calling operator in the warning.
 *
 * @throws IndexOutOfRangeError for a position outside the table
 * @throws InvalidIndexError for a non-integer position
 */
export function resolve(
  table: Table,
  key: KeySet,
  arity: Arity,
  operation: AccessOperation,
): Result<number[], NotFound> {
  const keys = toKeyList(key);
  const names = table._names;
  const indices: number[] = [];
  const missing: string[] = [];
  const candidates: string[] = [];

  for (const k of keys) {
    if (typeof k === 'number') {
      indices.push(toOffset(k, names.length, 'column'));
      continue;
    }

    const match = matchName(names, k, table.policy, arity);
    if (match.found) {
      indices.push(match.index);
    } else {
      missing.push(k);
      candidates.push(...match.candidates);
    }
  }

  if (missing.length > 0) {
    return err(notFound(table, operation, missing, candidates));
  }
  return ok(indices);
}

/**
 * Resolves exactly one key to a 0-based column index.
 */
export function resolveOne(
  table: Table,
  key: ColumnKey,
  arity: Arity,
  operation: AccessOperation,
): Result<number, NotFound> {
  const resolved = resolve(table, key, arity, operation);
  if (!resolved.ok) return resolved;
  return ok(resolved.data[0]);
}

/**
 * Normalizes a key or key set to a list.
 */
export function toKeyList(key: KeySet): readonly ColumnKey[] {
  return typeof key === 'string' || typeof key === 'number' ? [key] : key;
}

function matchName(
  names: readonly string[],
  key: string,
  policy: Policy,
  arity: Arity,
): NameMatch {
  const exact = names.indexOf(key);
  if (exact !== -1) return { found: true, index: exact };

  switch (policy) {
    case 'strict':
      return { found: false, candidates: [] };
    case 'legacy': {
      if (arity === 'double' || key.length === 0) return { found: false, candidates: [] };

      const prefixed: number[] = [];
      names.forEach((name, i) => {
        if (name.startsWith(key)) prefixed.push(i);
      });

      if (prefixed.length === 1) return { found: true, index: prefixed[0] };
      return { found: false, candidates: prefixed.map((i) => names[i]) };
    }
  }
}

function notFound(
  table: Table,
  operation: AccessOperation,
  keys: string[],
  candidates: string[],
): NotFound {
  switch (table.policy) {
    case 'legacy':
      return { keys, candidates };
    case 'strict':
      return {
        keys,
        candidates,
        warning: reportWarning(new MissingColumnWarning(operation, keys, [...table._names])),
      };
  }
}
