import { getConfig } from '../core/config';
import type { DualframeWarning } from '../errors';

/**
 * Mirrors a returned warning to the console when `echoWarnings` is set.
 * Returns the warning so callers can attach it in one expression.
 */
export function reportWarning<W extends DualframeWarning>(warning: W): W {
  if (getConfig().echoWarnings) {
    console.warn(warning.format());
  }
  return warning;
}
