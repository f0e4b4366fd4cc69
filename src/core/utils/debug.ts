/**
 * Debug output for core modules, enabled with DOMAIN_ROLES_DEBUG=true
 */

import chalk from 'chalk';

export function isDebugEnabled(): boolean {
  return process.env.DOMAIN_ROLES_DEBUG === 'true';
}

export function debug(message: string): void {
  if (isDebugEnabled()) {
    console.log(chalk.gray(`[domain-roles] ${message}`));
  }
}
