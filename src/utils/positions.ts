import { IndexOutOfRangeError, InvalidIndexError } from '../errors';

/**
 * Converts a 1-based position into a 0-based offset.
 *
 * @throws InvalidIndexError if the position is not an integer
 * @throws IndexOutOfRangeError if it falls outside 1..size
 */
export function toOffset(
  position: number,
  size: number,
  target: 'column' | 'row' | 'element',
): number {
  if (!Number.isInteger(position)) {
    throw new InvalidIndexError(
      `${target} position`,
      `takes whole numbers, got ${position}`,
      'positions are 1-based integers',
    );
  }
  if (position < 1 || position > size) {
    throw new IndexOutOfRangeError(position, size, target);
  }
  return position - 1;
}

/**
 * Converts a list of 1-based positions, validating each one.
 */
export function toOffsets(
  positions: readonly number[],
  size: number,
  target: 'column' | 'row' | 'element',
): number[] {
  return positions.map((p) => toOffset(p, size, target));
}
