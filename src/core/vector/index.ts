/**
 * Column vector module.
 */

export { ColumnVector } from './column-vector';
export { canRecycle, recycleOffsets } from './recycle';
export type { RecycleRejection } from './recycle';
export { createStorageFrom, gatherStorage, readStorage } from './storage';
export type { ColumnStorage } from './storage';
