import { describe, expect, test } from 'vitest';
import { ColumnVector } from '../../src/core/vector';
import { IndexOutOfRangeError, InvalidIndexError, SchemaError } from '../../src/errors';

describe('ColumnVector', () => {
  describe('factories', () => {
    test('bool stores booleans', () => {
      const v = ColumnVector.bool([true, false, true]);
      expect(v.kind).toBe('bool');
      expect(v.length).toBe(3);
      expect(v.toArray()).toEqual([true, false, true]);
    });

    test('int32 truncates floats toward zero', () => {
      const v = ColumnVector.int32([1.9, -2.7, 3]);
      expect(v.kind).toBe('int32');
      expect(v.toArray()).toEqual([1, -2, 3]);
    });

    test('int32 copies a typed array', () => {
      const source = new Int32Array([4, 5]);
      const v = ColumnVector.int32(source);
      source[0] = 99;
      expect(v.toArray()).toEqual([4, 5]);
    });

    test('float64 keeps fractions', () => {
      const v = ColumnVector.float64([1.5, 2.25]);
      expect(v.kind).toBe('float64');
      expect(v.toArray()).toEqual([1.5, 2.25]);
    });

    test('string copies its input', () => {
      const source = ['a', 'b'];
      const v = ColumnVector.string(source);
      source.push('c');
      expect(v.length).toBe(2);
      expect(v.toArray()).toEqual(['a', 'b']);
    });

    test('of() coerces into the requested kind', () => {
      expect(ColumnVector.of('string', [true, 2, 'x']).toArray()).toEqual(['true', '2', 'x']);
      expect(ColumnVector.of('float64', [true, '2.5', 3]).toArray()).toEqual([1, 2.5, 3]);
      expect(ColumnVector.of('bool', [0, 1, 'TRUE', 'no']).toArray()).toEqual([
        false,
        true,
        true,
        false,
      ]);
    });

    test('of() wraps integers outside the 32-bit range', () => {
      expect(ColumnVector.of('int32', [3e9]).toArray()).toEqual([-1294967296]);
    });

    test('of() stores unparsable text as zero in numeric columns', () => {
      expect(ColumnVector.of('float64', ['abc', '1.5']).toArray()).toEqual([0, 1.5]);
    });

    test('from() keeps large integers exact', () => {
      expect(ColumnVector.from([3e9]).toArray()).toEqual([3e9]);
    });
  });

  describe('from() inference', () => {
    test('integers become int32', () => {
      expect(ColumnVector.from([1, 2, 3]).kind).toBe('int32');
    });

    test('any fraction widens to float64', () => {
      const v = ColumnVector.from([1, 2.5]);
      expect(v.kind).toBe('float64');
      expect(v.toArray()).toEqual([1, 2.5]);
    });

    test('integers outside int32 range widen to float64', () => {
      expect(ColumnVector.from([1, 2 ** 40]).kind).toBe('float64');
    });

    test('booleans widen to numbers', () => {
      const v = ColumnVector.from([true, 3]);
      expect(v.kind).toBe('int32');
      expect(v.toArray()).toEqual([1, 3]);
    });

    test('any string forces text', () => {
      const v = ColumnVector.from(['a', 1, false]);
      expect(v.kind).toBe('string');
      expect(v.toArray()).toEqual(['a', '1', 'false']);
    });

    test('empty input is boolean', () => {
      const v = ColumnVector.from([]);
      expect(v.kind).toBe('bool');
      expect(v.length).toBe(0);
    });

    test('rejects values that are not scalars', () => {
      expect(() => ColumnVector.from([1, null])).toThrow(SchemaError);
      expect(() => ColumnVector.from([{}])).toThrow(SchemaError);
    });
  });

  describe('element access', () => {
    const v = ColumnVector.string(['x', 'y', 'z']);

    test('at() is 1-based', () => {
      expect(v.at(1)).toBe('x');
      expect(v.at(3)).toBe('z');
    });

    test('at() throws outside 1..length', () => {
      expect(() => v.at(0)).toThrow(IndexOutOfRangeError);
      expect(() => v.at(4)).toThrow(IndexOutOfRangeError);
    });

    test('at() rejects fractional positions', () => {
      expect(() => v.at(1.5)).toThrow(InvalidIndexError);
    });

    test('get() is 0-based and returns undefined out of bounds', () => {
      expect(v.get(0)).toBe('x');
      expect(v.get(-1)).toBeUndefined();
      expect(v.get(3)).toBeUndefined();
    });

    test('is iterable', () => {
      expect([...v]).toEqual(['x', 'y', 'z']);
    });

    test('take() gathers positions in order, repeats allowed', () => {
      expect(v.take([3, 1, 1]).toArray()).toEqual(['z', 'x', 'x']);
      expect(v.take([]).length).toBe(0);
    });

    test('take() rejects rows past the end', () => {
      expect(() => v.take([4])).toThrow(IndexOutOfRangeError);
    });

    test('bool columns read back as booleans', () => {
      const flags = ColumnVector.bool([false, true]);
      expect(flags.at(2)).toBe(true);
      expect(flags.take([2, 1]).toArray()).toEqual([true, false]);
    });
  });

  describe('recycle()', () => {
    test('legacy repeats a divisor length cyclically', () => {
      const result = ColumnVector.int32([1, 2]).recycle(6, 'legacy');
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.data.toArray()).toEqual([1, 2, 1, 2, 1, 2]);
        expect(result.data.kind).toBe('int32');
      }
    });

    test('legacy rejects a length that does not divide the target', () => {
      const result = ColumnVector.int32([1, 2]).recycle(5, 'legacy');
      expect(result).toEqual({
        ok: false,
        error: { policy: 'legacy', sourceLength: 2, targetLength: 5 },
      });
    });

    test('legacy rejects an empty source for a non-empty target', () => {
      expect(ColumnVector.int32([]).recycle(3, 'legacy').ok).toBe(false);
      expect(ColumnVector.int32([]).recycle(0, 'legacy').ok).toBe(true);
    });

    test('strict only broadcasts or fits exactly', () => {
      expect(ColumnVector.int32([1, 2]).recycle(6, 'strict').ok).toBe(false);

      const broadcast = ColumnVector.string(['k']).recycle(3, 'strict');
      expect(broadcast.ok).toBe(true);
      if (broadcast.ok) {
        expect(broadcast.data.toArray()).toEqual(['k', 'k', 'k']);
      }
    });

    test('an exact fit returns the same vector', () => {
      const v = ColumnVector.float64([1, 2, 3]);
      const result = v.recycle(3, 'strict');
      expect(result.ok && result.data).toBe(v);
    });

    test('leaves the source untouched', () => {
      const v = ColumnVector.int32([1, 2]);
      v.recycle(4, 'legacy');
      expect(v.toArray()).toEqual([1, 2]);
    });
  });

  describe('equals()', () => {
    test('compares kind and values', () => {
      expect(ColumnVector.int32([1, 2]).equals(ColumnVector.int32([1, 2]))).toBe(true);
      expect(ColumnVector.int32([1, 2]).equals(ColumnVector.float64([1, 2]))).toBe(false);
      expect(ColumnVector.int32([1, 2]).equals(ColumnVector.int32([1, 3]))).toBe(false);
    });

    test('treats NaN as equal to NaN', () => {
      expect(ColumnVector.float64([Number.NaN]).equals(ColumnVector.float64([Number.NaN]))).toBe(
        true,
      );
    });
  });

  test('toString() shows kind, length and values', () => {
    expect(ColumnVector.int32([1, 2]).toString()).toBe('<int32[2]> 1 2');
  });
});
