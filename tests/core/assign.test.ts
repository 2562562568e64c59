import { describe, expect, test } from 'vitest';
import { ColumnVector, Table } from '../../src';
import { LengthMismatchError, RecycleLengthWarning, SchemaError } from '../../src/errors';

const letters = 'abcdefghijklmnopqrstuvwxyz'.split('');

describe('Column assignment', () => {
  describe('recycling', () => {
    test('legacy repeats a length dividing the row count', () => {
      const t = Table.make({ letters }, 'legacy');
      const result = t.assign('flag', [true, false]);

      expect(result.applied).toBe(true);
      expect(result.warning).toBeUndefined();
      expect(result.table.shape).toEqual([26, 2]);

      const flag = result.table.col('flag').value;
      expect(flag?.kind).toBe('bool');
      expect(flag?.at(1)).toBe(true);
      expect(flag?.at(2)).toBe(false);
      expect(flag?.at(25)).toBe(true);
      expect(flag?.at(26)).toBe(false);
    });

    test('strict throws for the same source and leaves the receiver alone', () => {
      const t = Table.make({ letters }, 'strict');
      expect(() => t.assign('flag', [true, false])).toThrow(LengthMismatchError);
      expect(t.names).toEqual(['letters']);
    });

    test('a single value broadcasts under both policies', () => {
      for (const policy of ['legacy', 'strict'] as const) {
        const result = Table.make({ letters }, policy).assign('k', [7]);
        expect(result.applied).toBe(true);
        expect(result.table.col('k').value?.toArray()).toEqual(Array(26).fill(7));
      }
    });

    test('legacy leaves the table unchanged for a non-divisor length', () => {
      const t = Table.make({ letters }, 'legacy');
      const result = t.assign('flag', [1, 2, 3]);

      expect(result.applied).toBe(false);
      expect(result.table).toBe(t);
      expect(result.warning).toBeInstanceOf(RecycleLengthWarning);
      expect(result.warning?.sourceLength).toBe(3);
      expect(result.warning?.targetLength).toBe(26);
    });

    test('legacy rejects an empty source on a table with rows', () => {
      const t = Table.make({ a: [1, 2] }, 'legacy');
      const result = t.assign('b', []);
      expect(result.applied).toBe(false);
      expect(result.warning).toBeInstanceOf(RecycleLengthWarning);
    });

    test('strict reports both lengths', () => {
      const t = Table.make({ a: [1, 2, 3] }, 'strict');
      try {
        t.assign('b', [1, 2]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(LengthMismatchError);
        if (error instanceof LengthMismatchError) {
          expect(error.sourceLength).toBe(2);
          expect(error.targetLength).toBe(3);
        }
      }
    });
  });

  describe('placement', () => {
    test('replacing keeps the column position', () => {
      const t = Table.make({ a: [1, 2], b: [3, 4], c: [5, 6] }, 'strict');
      const result = t.assign('b', ['x', 'y']);

      expect(result.table.names).toEqual(['a', 'b', 'c']);
      expect(result.table.describe().kinds).toEqual(['int32', 'string', 'int32']);
      expect(result.table.column(2).toArray()).toEqual(['x', 'y']);
    });

    test('a new name is appended', () => {
      const t = Table.make({ a: [1, 2] }, 'strict');
      expect(t.assign('z', [0.5, 1.5]).table.names).toEqual(['a', 'z']);
    });

    test('untouched columns are shared with the receiver', () => {
      const t = Table.make({ a: [1, 2], b: [3, 4] }, 'legacy');
      const next = t.assign('b', [9]).table;

      expect(next).not.toBe(t);
      expect(next.column(1)).toBe(t.column(1));
      expect(t.column(2).toArray()).toEqual([3, 4]);
    });

    test('keeps the receiver policy', () => {
      const t = Table.make({ a: [1] }, 'strict');
      expect(t.assign('b', [2]).table.policy).toBe('strict');
    });

    test('accepts a vector as the source', () => {
      const t = Table.make({ a: [1, 2, 3, 4] }, 'legacy');
      const source = ColumnVector.float64([0.5, 1]);
      const b = t.assign('b', source).table.column(2);

      expect(b.kind).toBe('float64');
      expect(b.toArray()).toEqual([0.5, 1, 0.5, 1]);
    });

    test('names match exactly, never by prefix', () => {
      const t = Table.make({ values: [1, 2] }, 'legacy');
      const next = t.assign('val', [3, 4]).table;

      expect(next.names).toEqual(['values', 'val']);
      expect(next.column(1).toArray()).toEqual([1, 2]);
    });
  });

  describe('tables without columns', () => {
    test('take their row count from the source', () => {
      const empty = Table.make({}, 'strict');
      const result = empty.assign('a', [1, 2, 3]);

      expect(result.applied).toBe(true);
      expect(result.table.shape).toEqual([3, 1]);
    });
  });

  test('an empty name is rejected', () => {
    const t = Table.make({ a: [1] }, 'legacy');
    expect(() => t.assign('', [1])).toThrow(SchemaError);
  });
});
