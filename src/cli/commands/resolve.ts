/**
 * Resolve command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as logger from '../utils/logger.js';
import { loadSessionConfig, parseDomainRoles } from '../../core/config/index.js';
import {
  resolveConfigs,
  verifyCredentials,
  errorMessage,
} from '../../core/aws/index.js';
import type { ResolvedConfig, AWSAccountInfo } from '../../types/aws.js';
import type { SessionConfig } from '../../types/config.js';

/**
 * Resolve command options
 */
export interface ResolveCommandOptions {
  profile?: string;
  region?: string;
  assumeRole?: string;
  externalId?: string;
  apiRetries?: string;
  domainRole: string[];
  env?: string;
  verify?: boolean;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Outcome of verifying one resolved configuration
 */
interface VerificationResult {
  resolved: ResolvedConfig;
  identity?: AWSAccountInfo;
  error?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create resolve command
 */
export function createResolveCommand(): Command {
  const command = new Command('resolve');

  command
    .description('Resolve AWS client configurations for each domain role')
    .option('-p, --profile <profile>', 'Shared credentials file profile')
    .option('-r, --region <region>', 'AWS region')
    .option('--assume-role <arn>', 'Role assumed for domains without their own role')
    .option('--external-id <id>', 'External ID sent with role assumptions')
    .option('--api-retries <count>', 'Max attempts per AWS API call')
    .option(
      '--domain-role <domain=arn>',
      'Role for a domain (repeatable)',
      collect,
      []
    )
    .option('-e, --env <environment>', 'Environment name for .env files')
    .option('--verify', 'Call STS GetCallerIdentity with each configuration')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .action(async (options: ResolveCommandOptions) => {
      try {
        const failed = await resolveCommand(options);
        if (failed > 0) {
          process.exit(1);
        }
      } catch (error: unknown) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });

  return command;
}

/**
 * Translate CLI flags into session config overrides
 */
export function toOverrides(options: ResolveCommandOptions): SessionConfig {
  const overrides: SessionConfig = {
    profile: options.profile,
    region: options.region,
    assumeRole: options.assumeRole,
    assumeRoleExternalId: options.externalId,
  };

  if (options.apiRetries !== undefined) {
    const retries = Number(options.apiRetries);
    if (!Number.isInteger(retries)) {
      throw new Error(`--api-retries must be an integer, got "${options.apiRetries}"`);
    }
    overrides.apiRetries = retries;
  }

  if (options.domainRole.length > 0) {
    overrides.domainRolesMap = parseDomainRoles(options.domainRole);
  }

  return overrides;
}

function describeRole(resolved: ResolvedConfig): string {
  return resolved.roleArn ?? 'base credentials (no role)';
}

/**
 * Resolve command handler
 *
 * @returns Number of configurations that failed verification
 */
async function resolveCommand(options: ResolveCommandOptions): Promise<number> {
  const { env, verify = false, json = false } = options;
  logger.setVerbose(options.verbose ?? false);

  const session = loadSessionConfig({ env, overrides: toOverrides(options) });
  logger.verbose(`Region: ${session.region ?? '(SDK default)'}`);
  logger.verbose(`Profile: ${session.profile ?? '(default)'}`);

  const configs = await resolveConfigs(session);

  const results: VerificationResult[] = [];
  for (const resolved of configs) {
    if (!verify) {
      results.push({ resolved });
      continue;
    }

    const spinner = json ? null : ora(`Verifying ${describeRole(resolved)}...`).start();
    try {
      const identity = await verifyCredentials(resolved.config);
      spinner?.succeed(`Verified ${describeRole(resolved)}`);
      results.push({ resolved, identity });
    } catch (error) {
      spinner?.fail(`Verification failed for ${describeRole(resolved)}`);
      results.push({ resolved, error: errorMessage(error) });
    }
  }

  const failed = results.filter((result) => result.error !== undefined).length;

  if (json) {
    const output = results.map(({ resolved, identity, error }) => ({
      roleArn: resolved.roleArn ?? null,
      domains: resolved.domains,
      isDefault: resolved.isDefault,
      region: resolved.config.region ?? null,
      maxAttempts: resolved.config.maxAttempts ?? null,
      ...(identity ? { identity } : {}),
      ...(error ? { error } : {}),
    }));
    console.log(JSON.stringify(output, null, 2));
    return failed;
  }

  logger.section(`Resolved ${configs.length} configuration${configs.length === 1 ? '' : 's'}`);

  for (const { resolved, identity, error } of results) {
    console.log(chalk.bold(describeRole(resolved)));
    logger.keyValue('  Region', resolved.config.region ?? '(SDK default)');
    logger.keyValue(
      '  Domains',
      resolved.domains.length > 0 ? resolved.domains.join(', ') : '-'
    );
    if (resolved.isDefault) {
      logger.keyValue('  Default', chalk.cyan('yes'));
    }
    if (identity) {
      logger.keyValue('  Account', identity.accountId);
      logger.keyValue('  Caller', identity.arn);
    }
    if (error) {
      logger.keyValue('  Error', chalk.red(error));
    }
    console.log();
  }

  if (verify) {
    if (failed > 0) {
      logger.warn(`${failed} of ${configs.length} configurations failed verification`);
    } else {
      logger.success('All configurations verified');
    }
  }

  return failed;
}
