/**
 * Credentials verification using STS
 */

import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import type { AwsClientConfig, AWSAccountInfo } from '../../types/aws.js';
import { DomainRolesError } from './errors.js';

/**
 * Verify a resolved configuration by calling STS GetCallerIdentity
 *
 * @returns Identity the configuration's credentials act as
 * @throws Error if credentials cannot be retrieved or are rejected
 */
export async function verifyCredentials(
  config: AwsClientConfig
): Promise<AWSAccountInfo> {
  const client = new STSClient(config);

  try {
    const response = await client.send(new GetCallerIdentityCommand({}));

    if (!response.Account || !response.Arn || !response.UserId) {
      throw new Error('Invalid STS response: missing required fields');
    }

    return {
      accountId: response.Account,
      arn: response.Arn,
      userId: response.UserId,
    };
  } catch (error) {
    if (error instanceof DomainRolesError) {
      throw error;
    }
    if (error instanceof Error) {
      // AWS SDK errors
      if ('$metadata' in error) {
        throw new Error(
          `AWS credentials verification failed: ${error.message}`,
          { cause: error }
        );
      }
      throw error;
    }
    throw new Error(`Unknown error during credentials verification: ${String(error)}`);
  } finally {
    client.destroy();
  }
}

/**
 * Format AWS account info for display
 */
export function formatAccountInfo(info: AWSAccountInfo): string {
  return [
    `Account ID: ${info.accountId}`,
    `Caller ARN: ${info.arn}`,
    `User ID: ${info.userId}`,
  ].join('\n');
}
