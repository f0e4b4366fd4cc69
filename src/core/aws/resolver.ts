/**
 * Multi-domain credential resolution
 *
 * Produces one client configuration per distinct role so that each DNS
 * domain can be managed under its own identity.
 */

import type { SessionConfig } from '../../types/config.js';
import type { ResolvedConfig, RoleAssumer } from '../../types/aws.js';
import {
  assertProfileExists,
  buildBaseCredentialProvider,
} from './credentials.js';
import { createClientConfig } from './client.js';
import { createStsRoleAssumer } from './role-assumer.js';
import { debug } from '../utils/debug.js';

export interface ResolveOptions {
  /** Role assumer to use instead of one backed by STS */
  roleAssumer?: RoleAssumer;

  /** Session name prefix for role assumptions */
  sessionName?: string;
}

/**
 * Normalize a domain name for comparison
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.+$/, '');
}

/**
 * Collect distinct role ARNs with the domains each one serves
 */
function collectRoles(session: SessionConfig): Map<string, string[]> {
  const roles = new Map<string, string[]>();

  for (const [domain, roleArn] of Object.entries(session.domainRolesMap ?? {})) {
    if (!roleArn) {
      continue;
    }
    const domains = roles.get(roleArn) ?? [];
    domains.push(normalizeDomain(domain));
    roles.set(roleArn, domains);
  }

  if (session.assumeRole && !roles.has(session.assumeRole)) {
    roles.set(session.assumeRole, []);
  }

  return roles;
}

/**
 * Resolve the client configurations needed to cover every configured domain
 *
 * @returns At least one configuration, one per distinct role ARN
 * @throws ConfigConstructionError if the requested profile cannot be found
 *
 * @example
 * ```ts
 * const configs = await resolveConfigs({
 *   region: 'us-east-1',
 *   domainRolesMap: {
 *     'example.com': 'arn:aws:iam::123456789012:role/dns-example-com',
 *     'example.org': 'arn:aws:iam::123456789012:role/dns-example-org',
 *   },
 * });
 * const route53 = new Route53Client(configs[0].config);
 * ```
 */
export async function resolveConfigs(
  session: SessionConfig,
  options: ResolveOptions = {}
): Promise<ResolvedConfig[]> {
  await assertProfileExists(session);

  const baseProvider = buildBaseCredentialProvider(session);
  const region = session.region || undefined;
  const maxAttempts = session.apiRetries;
  const roles = collectRoles(session);

  if (roles.size === 0) {
    debug('No roles configured, using base credentials');
    return [
      {
        config: createClientConfig(baseProvider, { region, maxAttempts }),
        domains: [],
        isDefault: true,
      },
    ];
  }

  const roleAssumer =
    options.roleAssumer ??
    createStsRoleAssumer(baseProvider, { region, maxAttempts });

  const resolved: ResolvedConfig[] = [];
  for (const [roleArn, domains] of roles) {
    debug(
      `Role ${roleArn} serves ${domains.length > 0 ? domains.join(', ') : 'unmapped domains'}`
    );
    resolved.push({
      config: createClientConfig(baseProvider, {
        roleArn,
        region,
        maxAttempts,
        roleAssumer,
        externalId: session.assumeRoleExternalId,
        sessionName: options.sessionName,
      }),
      roleArn,
      domains: [...domains].sort(),
      isDefault: roleArn === session.assumeRole,
    });
  }

  return resolved;
}

/**
 * Pick the configuration for a DNS name: the most specific mapped domain
 * that equals or contains it, else the default configuration
 */
export function configForDomain(
  resolved: ResolvedConfig[],
  dnsName: string
): ResolvedConfig | undefined {
  const name = normalizeDomain(dnsName);
  let best: ResolvedConfig | undefined;
  let bestLength = -1;

  for (const candidate of resolved) {
    for (const domain of candidate.domains) {
      const matches = name === domain || name.endsWith(`.${domain}`);
      if (matches && domain.length > bestLength) {
        best = candidate;
        bestLength = domain.length;
      }
    }
  }

  return best ?? resolved.find((candidate) => candidate.isDefault);
}
