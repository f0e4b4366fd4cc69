/**
 * Error types raised while resolving and retrieving credentials
 */

/**
 * Base class for all credential resolution errors
 */
export class DomainRolesError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DomainRolesError';
  }
}

/**
 * Session configuration or shared credentials files are unusable.
 * Raised during resolution, before any network call.
 */
export class ConfigConstructionError extends DomainRolesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigConstructionError';
  }
}

/**
 * No credential source produced keys when the provider was called
 */
export class CredentialRetrievalError extends DomainRolesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CredentialRetrievalError';
  }
}

/**
 * STS refused or failed to issue credentials for a role
 */
export class RoleAssumptionError extends DomainRolesError {
  constructor(
    message: string,
    public readonly roleArn: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RoleAssumptionError';
  }
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
