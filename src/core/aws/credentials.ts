/**
 * AWS Credentials resolution
 */

import {
  fromEnv,
  fromIni,
  fromInstanceMetadata,
  fromContainerMetadata,
} from '@aws-sdk/credential-providers';
import { chain } from '@smithy/property-provider';
import { loadSharedConfigFiles } from '@smithy/shared-ini-file-loader';
import type {
  AwsCredentialIdentity,
  AwsCredentialIdentityProvider,
} from '@aws-sdk/types';
import type { SessionConfig } from '../../types/config.js';
import {
  ConfigConstructionError,
  CredentialRetrievalError,
  errorMessage,
} from './errors.js';
import { debug } from '../utils/debug.js';

const ENV_CMDS_RELATIVE_URI = 'AWS_CONTAINER_CREDENTIALS_RELATIVE_URI';
const ENV_CMDS_FULL_URI = 'AWS_CONTAINER_CREDENTIALS_FULL_URI';

/**
 * Container metadata when the ECS variables are present, instance metadata otherwise.
 * The container provider refuses to run without them and would stop the chain.
 */
function fromMetadata(): () => Promise<AwsCredentialIdentity> {
  const container = fromContainerMetadata();
  const instance = fromInstanceMetadata();

  return () =>
    process.env[ENV_CMDS_RELATIVE_URI] || process.env[ENV_CMDS_FULL_URI]
      ? container()
      : instance();
}

/**
 * Build the base credential provider for a session.
 *
 * Sources are probed lazily, in order, on every call until one succeeds:
 * 1. Environment variables (AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY)
 * 2. Shared credentials file (session profile, else AWS_PROFILE, else default)
 * 3. Container or instance metadata (IAM role)
 *
 * Nothing is read when the provider is built.
 */
export function buildBaseCredentialProvider(
  session: SessionConfig
): AwsCredentialIdentityProvider {
  const profile = session.profile || undefined;
  const resolveChain = chain<AwsCredentialIdentity>(
    fromEnv(),
    fromIni({ profile }),
    fromMetadata()
  );

  return async () => {
    try {
      return await resolveChain();
    } catch (error) {
      throw new CredentialRetrievalError(
        `No AWS credentials found.\n` +
          `Configure credentials using one of:\n` +
          `  1. Environment variables (AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY)\n` +
          `  2. AWS profile (${profile ?? 'default'} in ~/.aws/credentials or AWS_SHARED_CREDENTIALS_FILE)\n` +
          `  3. IAM role (ECS container or EC2 instance metadata)\n\n` +
          `Original error: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  };
}

/**
 * Fail fast when the session names a profile the shared files do not define
 */
export async function assertProfileExists(session: SessionConfig): Promise<void> {
  const { profile } = session;
  if (!profile) {
    return;
  }

  let files: Awaited<ReturnType<typeof loadSharedConfigFiles>>;
  try {
    files = await loadSharedConfigFiles();
  } catch (error) {
    throw new ConfigConstructionError(
      `Failed to read shared AWS config files: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (
    !Object.hasOwn(files.credentialsFile, profile) &&
    !Object.hasOwn(files.configFile, profile)
  ) {
    throw new ConfigConstructionError(
      `AWS profile "${profile}" not found in shared credentials or config file`
    );
  }

  debug(`Using AWS profile "${profile}"`);
}
