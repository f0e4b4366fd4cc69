/**
 * AWS integration module
 *
 * Provides credential chains, role assumption and per-domain client configurations
 */

// Credentials
export {
  buildBaseCredentialProvider,
  assertProfileExists,
} from './credentials.js';

// Role assumption
export {
  StsRoleAssumer,
  createStsRoleAssumer,
  createRoleSessionName,
  DEFAULT_SESSION_PREFIX,
  type StsRoleAssumerOptions,
} from './role-assumer.js';

export {
  createRoleCredentialProvider,
  DEFAULT_REFRESH_BEFORE_MS,
  type RoleCredentialProviderOptions,
  type RoleCredentialCallOptions,
} from './role-credentials.js';

// Client configuration
export {
  createClientConfig,
  type ClientConfigOptions,
} from './client.js';

// Resolution
export {
  resolveConfigs,
  configForDomain,
  normalizeDomain,
  type ResolveOptions,
} from './resolver.js';

// Verification
export {
  verifyCredentials,
  formatAccountInfo,
} from './verify.js';

// Errors
export {
  DomainRolesError,
  ConfigConstructionError,
  CredentialRetrievalError,
  RoleAssumptionError,
  errorMessage,
} from './errors.js';

// Re-export types
export type {
  AWSCredentials,
  AWSAccountInfo,
  AwsClientConfig,
  AssumeRoleRequest,
  AssumeRoleCallOptions,
  ResolvedConfig,
  RoleAssumer,
  TemporaryCredentials,
} from '../../types/aws.js';
