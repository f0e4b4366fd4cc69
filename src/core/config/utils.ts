/**
 * Config utility functions
 */

import type { SessionConfig } from '../../types/config.js';
import { normalizeDomain } from '../aws/resolver.js';

/**
 * Parse `domain=roleArn` pairs into a domain roles map
 *
 * @example
 * ```ts
 * parseDomainRoles(['example.com=arn:aws:iam::123456789012:role/dns']);
 * // { 'example.com': 'arn:aws:iam::123456789012:role/dns' }
 * ```
 */
export function parseDomainRoles(pairs: string[]): Record<string, string> {
  const map = new Map<string, string>();
  const errors: string[] = [];

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const domain = separator > 0 ? normalizeDomain(pair.slice(0, separator)) : '';
    const roleArn = separator > 0 ? pair.slice(separator + 1).trim() : '';

    if (!domain || !roleArn) {
      errors.push(`invalid domain role "${pair}", expected domain=roleArn`);
      continue;
    }

    const existing = map.get(domain);
    if (existing !== undefined && existing !== roleArn) {
      errors.push(`domain "${domain}" is mapped to both ${existing} and ${roleArn}`);
      continue;
    }

    map.set(domain, roleArn);
  }

  if (errors.length > 0) {
    throw new Error(
      `Domain roles validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`
    );
  }

  return Object.fromEntries(map);
}

/**
 * Split a comma separated list, dropping empty entries
 */
export function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Read a session config from DOMAIN_ROLES_* environment variables
 */
export function readSessionConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): SessionConfig {
  const config: SessionConfig = {};

  if (env.DOMAIN_ROLES_PROFILE) {
    config.profile = env.DOMAIN_ROLES_PROFILE;
  }
  if (env.DOMAIN_ROLES_REGION) {
    config.region = env.DOMAIN_ROLES_REGION;
  }
  if (env.DOMAIN_ROLES_ASSUME_ROLE) {
    config.assumeRole = env.DOMAIN_ROLES_ASSUME_ROLE;
  }
  if (env.DOMAIN_ROLES_ASSUME_ROLE_EXTERNAL_ID) {
    config.assumeRoleExternalId = env.DOMAIN_ROLES_ASSUME_ROLE_EXTERNAL_ID;
  }
  if (env.DOMAIN_ROLES_API_RETRIES) {
    const retries = Number(env.DOMAIN_ROLES_API_RETRIES);
    if (!Number.isInteger(retries)) {
      throw new Error(
        `DOMAIN_ROLES_API_RETRIES must be an integer, got "${env.DOMAIN_ROLES_API_RETRIES}"`
      );
    }
    config.apiRetries = retries;
  }

  const domainRoles = splitList(env.DOMAIN_ROLES_DOMAIN_ROLES);
  if (domainRoles.length > 0) {
    config.domainRolesMap = parseDomainRoles(domainRoles);
  }

  return config;
}
