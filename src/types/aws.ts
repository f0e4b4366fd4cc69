/**
 * AWS-related type definitions
 */

import type {
  AwsCredentialIdentity,
  AwsCredentialIdentityProvider,
} from "@aws-sdk/types";

/**
 * AWS credentials (from AWS SDK)
 */
export type AWSCredentials = AwsCredentialIdentity;

/**
 * Temporary credentials issued by STS for an assumed role
 */
export interface TemporaryCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiration: Date;
}

/**
 * Parameters of a single role assumption
 */
export interface AssumeRoleRequest {
  /** ARN of the role to assume */
  roleArn: string;

  /** Session name recorded by STS */
  roleSessionName: string;

  /** External ID required by the role's trust policy */
  externalId?: string;

  /** Session duration in seconds */
  durationSeconds?: number;
}

export interface AssumeRoleCallOptions {
  abortSignal?: AbortSignal;
}

/**
 * Exchanges a role ARN for temporary credentials
 */
export interface RoleAssumer {
  assumeRole(
    request: AssumeRoleRequest,
    options?: AssumeRoleCallOptions
  ): Promise<TemporaryCredentials>;
}

/**
 * Client configuration accepted by any AWS SDK v3 client constructor
 */
export interface AwsClientConfig {
  region?: string;
  credentials: AwsCredentialIdentityProvider;
  maxAttempts?: number;
}

/**
 * A client configuration scoped to at most one role
 */
export interface ResolvedConfig {
  config: AwsClientConfig;

  /** Role the configuration assumes (absent when no role is assumed) */
  roleArn?: string;

  /** Mapped domains served by this role */
  domains: string[];

  /** Whether this configuration serves domains without a mapped role */
  isDefault: boolean;
}

/**
 * AWS account information from STS
 */
export interface AWSAccountInfo {
  /** AWS Account ID */
  accountId: string;

  /** Caller ARN */
  arn: string;

  /** Caller user ID */
  userId: string;
}
