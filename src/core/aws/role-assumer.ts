/**
 * STS role assumption
 */

import { STSClient, AssumeRoleCommand } from '@aws-sdk/client-sts';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type {
  AssumeRoleCallOptions,
  AssumeRoleRequest,
  RoleAssumer,
  TemporaryCredentials,
} from '../../types/aws.js';
import { RoleAssumptionError } from './errors.js';

/** Default session name prefix */
export const DEFAULT_SESSION_PREFIX = 'aws-domain-roles';

// STS limits RoleSessionName to 64 characters of [\w+=,.@-]
const MAX_SESSION_NAME_LENGTH = 64;

/**
 * Build an STS session name from a prefix and the current time
 *
 * @example
 * ```ts
 * createRoleSessionName('dns-sync', new Date(1700000000000));
 * // 'dns-sync-1700000000000'
 * ```
 */
export function createRoleSessionName(
  prefix: string = DEFAULT_SESSION_PREFIX,
  now: Date = new Date()
): string {
  const sanitized = prefix.replace(/[^\w+=,.@-]/g, '-') || DEFAULT_SESSION_PREFIX;
  const suffix = `-${now.getTime()}`;
  return sanitized.slice(0, MAX_SESSION_NAME_LENGTH - suffix.length) + suffix;
}

/**
 * Role assumer backed by the STS AssumeRole API.
 * STS errors are passed through unchanged; retries belong to the client.
 */
export class StsRoleAssumer implements RoleAssumer {
  constructor(private readonly client: STSClient) {}

  async assumeRole(
    request: AssumeRoleRequest,
    options: AssumeRoleCallOptions = {}
  ): Promise<TemporaryCredentials> {
    const command = new AssumeRoleCommand({
      RoleArn: request.roleArn,
      RoleSessionName: request.roleSessionName,
      ExternalId: request.externalId,
      DurationSeconds: request.durationSeconds,
    });

    const response = await this.client.send(command, {
      abortSignal: options.abortSignal,
    });

    if (!response.Credentials) {
      throw new RoleAssumptionError(
        `STS AssumeRole succeeded but did not return credentials for role ${request.roleArn}`,
        request.roleArn
      );
    }

    const { AccessKeyId, SecretAccessKey, SessionToken, Expiration } =
      response.Credentials;

    if (!AccessKeyId || !SecretAccessKey || !SessionToken || !Expiration) {
      throw new RoleAssumptionError(
        `STS AssumeRole returned incomplete credentials for role ${request.roleArn}`,
        request.roleArn
      );
    }

    return {
      accessKeyId: AccessKeyId,
      secretAccessKey: SecretAccessKey,
      sessionToken: SessionToken,
      expiration: Expiration,
    };
  }
}

/**
 * STS client options for the production role assumer
 */
export interface StsRoleAssumerOptions {
  region?: string;
  maxAttempts?: number;
}

/**
 * Create a role assumer whose STS calls are signed with the base credentials
 */
export function createStsRoleAssumer(
  baseProvider: AwsCredentialIdentityProvider,
  options: StsRoleAssumerOptions = {}
): StsRoleAssumer {
  return new StsRoleAssumer(
    new STSClient({
      region: options.region,
      credentials: baseProvider,
      maxAttempts: options.maxAttempts,
    })
  );
}
