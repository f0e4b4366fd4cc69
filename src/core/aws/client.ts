/**
 * AWS client configuration creation
 */

import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { AwsClientConfig, RoleAssumer } from '../../types/aws.js';
import { createRoleCredentialProvider } from './role-credentials.js';

/**
 * Client configuration options
 */
export interface ClientConfigOptions {
  /** Role to assume; empty or absent uses the base credentials as they are */
  roleArn?: string;

  /** AWS region */
  region?: string;

  /** Max attempts per API call */
  maxAttempts?: number;

  /** Required when roleArn is set */
  roleAssumer?: RoleAssumer;

  /** External ID sent with the role assumption */
  externalId?: string;

  /** Session name prefix for the role assumption */
  sessionName?: string;
}

/**
 * Create a client configuration, wrapping the base provider in a role
 * assumption when a role ARN is given
 */
export function createClientConfig(
  baseProvider: AwsCredentialIdentityProvider,
  options: ClientConfigOptions = {}
): AwsClientConfig {
  const { roleArn, region, maxAttempts, roleAssumer, externalId, sessionName } =
    options;

  let credentials = baseProvider;

  if (roleArn) {
    if (!roleAssumer) {
      throw new Error(`A role assumer is required to assume role ${roleArn}`);
    }
    credentials = createRoleCredentialProvider({
      roleArn,
      roleAssumer,
      externalId,
      sessionName,
    });
  }

  return {
    region,
    credentials,
    maxAttempts,
  };
}
