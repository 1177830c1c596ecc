/**
 * Adapter configuration - resource limits and provenance namespace applied
 * to every container an adapter launches.
 */

import { ValidationError } from './errors';

export interface AdapterConfig {
  /** Label prefix for the `<namespace>-created` provenance label */
  readonly namespace: string;
  /** CPU cores per container, 0 = unlimited */
  readonly cpus: number;
  /** Memory limit in MB, 0 = unlimited */
  readonly memory: number;
  /** Memory + swap limit in MB, 0 = unlimited */
  readonly swap: number;
}

export const DEFAULT_ADAPTER_CONFIG: AdapterConfig = Object.freeze({
  namespace: 'utopia',
  cpus: 0,
  memory: 0,
  swap: 0,
});

function assertLimit(field: 'cpus' | 'memory' | 'swap', value: number, integer: boolean): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative number, got ${value}`, field);
  }
  if (integer && !Number.isInteger(value)) {
    throw new ValidationError(`${field} must be a whole number of MB, got ${value}`, field);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 * The returned object is frozen.
 */
export function resolveAdapterConfig(
  overrides: Partial<AdapterConfig> = {},
  base: AdapterConfig = DEFAULT_ADAPTER_CONFIG,
): AdapterConfig {
  const config: AdapterConfig = {
    namespace: overrides.namespace ?? base.namespace,
    cpus: overrides.cpus ?? base.cpus,
    memory: overrides.memory ?? base.memory,
    swap: overrides.swap ?? base.swap,
  };

  if (config.namespace.trim() === '') {
    throw new ValidationError('namespace must not be empty', 'namespace');
  }
  assertLimit('cpus', config.cpus, false);
  assertLimit('memory', config.memory, true);
  assertLimit('swap', config.swap, true);

  return Object.freeze(config);
}
