/**
 * Role-scoped credential provider with a lazily refreshed token cache
 */

import type {
  AwsCredentialIdentity,
  AwsCredentialIdentityProvider,
} from '@aws-sdk/types';
import type { RoleAssumer, TemporaryCredentials } from '../../types/aws.js';
import { RoleAssumptionError, errorMessage } from './errors.js';
import { createRoleSessionName } from './role-assumer.js';
import { debug } from '../utils/debug.js';

/** Cached credentials count as expired this long before STS says so */
export const DEFAULT_REFRESH_BEFORE_MS = 5 * 60 * 1000;

export interface RoleCredentialProviderOptions {
  roleArn: string;
  roleAssumer: RoleAssumer;
  externalId?: string;
  /** Session name prefix */
  sessionName?: string;
  durationSeconds?: number;
  refreshBeforeMs?: number;
  now?: () => number;
}

/**
 * Call options accepted by the returned provider
 */
export interface RoleCredentialCallOptions {
  abortSignal?: AbortSignal;
}

/**
 * Create a provider that assumes `roleArn` on first use and re-assumes it once
 * the cached credentials are inside the refresh window.
 *
 * Concurrent calls during a refresh share a single STS request. A caller's
 * abort signal rejects only that caller; the shared request keeps running.
 * A failed assumption is not cached.
 */
export function createRoleCredentialProvider(
  options: RoleCredentialProviderOptions
): AwsCredentialIdentityProvider {
  const {
    roleArn,
    roleAssumer,
    externalId,
    sessionName,
    durationSeconds,
    refreshBeforeMs = DEFAULT_REFRESH_BEFORE_MS,
    now = Date.now,
  } = options;

  let cached: TemporaryCredentials | undefined;
  let inflight: Promise<TemporaryCredentials> | undefined;

  const isValid = (credentials: TemporaryCredentials): boolean =>
    now() < credentials.expiration.getTime() - refreshBeforeMs;

  // Shared by every waiting caller, so no caller's signal is attached
  const refresh = async (): Promise<TemporaryCredentials> => {
    debug(`Assuming role ${roleArn}`);
    try {
      const credentials = await roleAssumer.assumeRole({
        roleArn,
        roleSessionName: createRoleSessionName(sessionName, new Date(now())),
        externalId,
        durationSeconds,
      });
      cached = credentials;
      return credentials;
    } catch (error) {
      if (error instanceof RoleAssumptionError) {
        throw error;
      }
      throw new RoleAssumptionError(
        `Failed to assume role ${roleArn}: ${errorMessage(error)}`,
        roleArn,
        { cause: error }
      );
    }
  };

  const abortedError = (signal: AbortSignal): RoleAssumptionError =>
    new RoleAssumptionError(
      `Credential request for role ${roleArn} was aborted`,
      roleArn,
      { cause: signal.reason }
    );

  /**
   * Settle with the shared refresh, or reject this caller alone on abort
   */
  const awaitWithSignal = (
    shared: Promise<TemporaryCredentials>,
    signal: AbortSignal
  ): Promise<TemporaryCredentials> =>
    new Promise<TemporaryCredentials>((resolve, reject) => {
      const onAbort = () => reject(abortedError(signal));
      signal.addEventListener('abort', onAbort, { once: true });
      void shared.then(
        (credentials) => {
          signal.removeEventListener('abort', onAbort);
          resolve(credentials);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });

  return async (
    callOptions: RoleCredentialCallOptions = {}
  ): Promise<AwsCredentialIdentity> => {
    const { abortSignal } = callOptions;

    if (cached && isValid(cached)) {
      return cached;
    }

    if (abortSignal?.aborted) {
      throw abortedError(abortSignal);
    }

    if (!inflight) {
      inflight = refresh().finally(() => {
        inflight = undefined;
      });
    }

    return abortSignal ? awaitWithSignal(inflight, abortSignal) : inflight;
  };
}
