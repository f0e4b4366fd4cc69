/**
 * Session configuration merger
 */

import type { SessionConfig } from '../../types/config.js';

/**
 * Merge two session configs; defined override values win.
 * Domain role maps are merged key by key.
 */
export function mergeSessionConfig(
  base: SessionConfig,
  override: SessionConfig = {}
): SessionConfig {
  const merged: SessionConfig = {
    profile: override.profile ?? base.profile,
    region: override.region ?? base.region,
    assumeRole: override.assumeRole ?? base.assumeRole,
    assumeRoleExternalId:
      override.assumeRoleExternalId ?? base.assumeRoleExternalId,
    apiRetries: override.apiRetries ?? base.apiRetries,
  };

  if (base.domainRolesMap || override.domainRolesMap) {
    merged.domainRolesMap = {
      ...base.domainRolesMap,
      ...override.domainRolesMap,
    };
  }

  return merged;
}
