import type { Policy } from '../types';

/**
 * Why a source could not be recycled to a target length.
 */
export interface RecycleRejection {
  readonly policy: Policy;
  readonly sourceLength: number;
  readonly targetLength: number;
}

/**
 * Whether a source of the given length may fill the target length.
 *
 * Legacy repeats any source whose length divides the target. Strict only
 * broadcasts a single value or takes an exact fit.
 */
export function canRecycle(sourceLength: number, targetLength: number, policy: Policy): boolean {
  switch (policy) {
    case 'legacy':
      if (sourceLength === 0) return targetLength === 0;
      return targetLength % sourceLength === 0;
    case 'strict':
      return sourceLength === 1 || sourceLength === targetLength;
  }
}

/**
 * 0-based source offsets that fill the target length cyclically.
 */
export function recycleOffsets(sourceLength: number, targetLength: number): number[] {
  const offsets = new Array<number>(targetLength);
  for (let i = 0; i < targetLength; i++) {
    offsets[i] = i % sourceLength;
  }
  return offsets;
}
