/**
 * Error module - exports all dualframe error and warning types.
 */

export { DualframeError, DualframeWarning } from './base';
export { IndexOutOfRangeError } from './index-out-of-range';
export { InvalidIndexError } from './invalid-index';
export { LengthMismatchError } from './length-mismatch';
export { MissingColumnWarning } from './missing-column-warning';
export type { AccessOperation } from './missing-column-warning';
export { RecycleLengthWarning } from './recycle-length-warning';
export { SchemaError } from './schema-error';
export { ShapeError } from './shape-error';
export { UnequalColumnLengthError } from './unequal-column-length';
