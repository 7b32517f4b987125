import { loadConfig, toRuntimeConfig, validateExternalConfig, type ExternalConfig } from '../config/loader.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Load and validate configuration, then build the services.
 * Throws `ConfigError` listing every problem.
 */
export function openRuntime(cliOverrides?: ExternalConfig): Runtime {
  const external = loadConfig({ cliOverrides });
  const errors = validateExternalConfig(external);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration:\n  - ${errors.join('\n  - ')}`, 'INVALID_CONFIG');
  }
  return createRuntime(toRuntimeConfig(external));
}
