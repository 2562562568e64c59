import type { ColumnKind, Scalar, StorageType } from '../types';
import { toBoolean, toNumber, toText } from '../types';

/**
 * Backing storage of a column, tagged by kind.
 * Booleans are stored as 0/1 bytes.
 */
export type ColumnStorage = {
  [K in ColumnKind]: { readonly kind: K; readonly data: StorageType<K> };
}[ColumnKind];

/**
 * Creates storage of the given kind, coercing each value into it.
 */
export function createStorageFrom(kind: ColumnKind, values: readonly Scalar[]): ColumnStorage {
  switch (kind) {
    case 'bool': {
      const data = new Uint8Array(values.length);
      for (let i = 0; i < values.length; i++) {
        data[i] = toBoolean(values[i]) ? 1 : 0;
      }
      return { kind, data };
    }
    case 'int32': {
      const data = new Int32Array(values.length);
      for (let i = 0; i < values.length; i++) {
        data[i] = Math.trunc(toNumber(values[i]));
      }
      return { kind, data };
    }
    case 'float64': {
      const data = new Float64Array(values.length);
      for (let i = 0; i < values.length; i++) {
        data[i] = toNumber(values[i]);
      }
      return { kind, data };
    }
    case 'string':
      return { kind, data: values.map(toText) };
  }
}

/**
 * Reads the value at a 0-based offset. The caller checks bounds.
 */
export function readStorage(storage: ColumnStorage, offset: number): Scalar {
  switch (storage.kind) {
    case 'bool':
      return storage.data[offset] === 1;
    case 'int32':
    case 'float64':
      return storage.data[offset];
    case 'string':
      return storage.data[offset];
  }
}

/**
 * Copies the values at the given 0-based offsets into new storage of the
 * same kind. Offsets may repeat.
 */
export function gatherStorage(storage: ColumnStorage, offsets: readonly number[]): ColumnStorage {
  switch (storage.kind) {
    case 'bool': {
      const source = storage.data;
      const data = new Uint8Array(offsets.length);
      for (let i = 0; i < offsets.length; i++) {
        data[i] = source[offsets[i]];
      }
      return { kind: 'bool', data };
    }
    case 'int32': {
      const source = storage.data;
      const data = new Int32Array(offsets.length);
      for (let i = 0; i < offsets.length; i++) {
        data[i] = source[offsets[i]];
      }
      return { kind: 'int32', data };
    }
    case 'float64': {
      const source = storage.data;
      const data = new Float64Array(offsets.length);
      for (let i = 0; i < offsets.length; i++) {
        data[i] = source[offsets[i]];
      }
      return { kind: 'float64', data };
    }
    case 'string': {
      const source = storage.data;
      return { kind: 'string', data: offsets.map((o) => source[o]) };
    }
  }
}
