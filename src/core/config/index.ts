/**
 * Config system entry point
 */

import type {
  SessionConfig,
  LoadSessionConfigOptions,
} from '../../types/config.js';
import { loadEnvFiles } from './env-loader.js';
import { mergeSessionConfig } from './merger.js';
import { validateSessionConfig } from './schema.js';
import { readSessionConfigFromEnv } from './utils.js';
import { ConfigConstructionError, errorMessage } from '../aws/errors.js';

/**
 * Load and validate a session configuration
 *
 * Sources (highest priority first): overrides, DOMAIN_ROLES_* environment
 * variables, .env files.
 *
 * @example
 * ```ts
 * // Environment only
 * const session = loadSessionConfig();
 *
 * // With .env.prod and a CLI override
 * const session = loadSessionConfig({ env: 'prod', overrides: { region: 'eu-west-1' } });
 * ```
 */
export function loadSessionConfig(
  options: LoadSessionConfigOptions = {}
): SessionConfig {
  const { env, envDir, overrides } = options;

  try {
    // Step 1: Load .env files into process.env
    loadEnvFiles(env, envDir);

    // Step 2: Read DOMAIN_ROLES_* variables
    const fromEnv = readSessionConfigFromEnv();

    // Step 3: Apply overrides
    const merged = mergeSessionConfig(fromEnv, overrides);

    // Step 4: Validate
    return validateSessionConfig(merged);
  } catch (error) {
    throw new ConfigConstructionError(
      `Failed to load session configuration:\n${errorMessage(error)}`,
      { cause: error }
    );
  }
}

export { loadEnvFiles, getEnvFilePaths } from './env-loader.js';
export { mergeSessionConfig } from './merger.js';
export {
  sessionConfigSchema,
  validateSessionConfig,
  validateSessionConfigSafe,
} from './schema.js';
export { parseDomainRoles, readSessionConfigFromEnv, splitList } from './utils.js';

// Re-export types
export type { SessionConfig, LoadSessionConfigOptions } from '../../types/config.js';
