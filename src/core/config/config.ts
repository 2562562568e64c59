import { SchemaError } from '../../errors';
import { type Policy, isPolicy } from '../types';

/**
 * Process-wide table configuration.
 */
export interface TableConfig {
  /** Policy given to tables built without an explicit one (default: 'legacy') */
  defaultPolicy: Policy;

  /** Also write every returned warning to console.warn (default: false) */
  echoWarnings: boolean;
}

/**
 * Default table configuration.
 */
const DEFAULT_CONFIG: TableConfig = {
  defaultPolicy: 'legacy',
  echoWarnings: false,
};

/** Current global configuration */
let currentConfig: TableConfig = { ...DEFAULT_CONFIG };

/**
 * Configure global defaults.
 *
 * @example
 * ```ts
 * import { configure } from 'dualframe';
 *
 * // Build strict tables unless told otherwise
 * configure({ defaultPolicy: 'strict' });
 *
 * // Mirror warnings to the console
 * configure({ echoWarnings: true });
 * ```
 */
export function configure(options: Partial<TableConfig>): void {
  if (options.defaultPolicy !== undefined && !isPolicy(options.defaultPolicy)) {
    throw new SchemaError(
      `unknown policy '${String(options.defaultPolicy)}'`,
      "policy must be 'legacy' or 'strict'",
    );
  }
  currentConfig = { ...currentConfig, ...options };
}

/**
 * Get current configuration.
 */
export function getConfig(): Readonly<TableConfig> {
  return currentConfig;
}

/**
 * Reset configuration to defaults.
 */
export function resetConfig(): void {
  currentConfig = { ...DEFAULT_CONFIG };
}

/**
 * Get default configuration.
 */
export function getDefaultConfig(): Readonly<TableConfig> {
  return DEFAULT_CONFIG;
}
