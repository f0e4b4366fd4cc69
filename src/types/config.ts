/**
 * Configuration types for domain role resolution
 */

/**
 * Session configuration used to resolve AWS client configurations
 */
export interface SessionConfig {
  /** Profile name from the shared credentials file */
  profile?: string;

  /** AWS region attached to every resolved configuration */
  region?: string;

  /** Role ARN assumed for every domain without its own role */
  assumeRole?: string;

  /** External ID sent with every role assumption */
  assumeRoleExternalId?: string;

  /** Maximum SDK attempts per API call */
  apiRetries?: number;

  /** Domain name to role ARN */
  domainRolesMap?: Record<string, string>;
}

/**
 * Options for loading a session configuration from the environment
 */
export interface LoadSessionConfigOptions {
  /** Environment name used to pick .env files (e.g., 'dev', 'prod') */
  env?: string;

  /** Directory containing .env files */
  envDir?: string;

  /** Values that take precedence over environment variables (CLI flags) */
  overrides?: SessionConfig;
}
