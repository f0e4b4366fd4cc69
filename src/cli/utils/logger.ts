/**
 * CLI logging utilities
 */

import chalk from 'chalk';

let verboseEnabled = false;

/**
 * Turn verbose output on or off for the rest of the process
 */
export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Log verbose message (only in verbose mode)
 */
export function verbose(message: string): void {
  if (verboseEnabled) {
    console.log(chalk.gray('[verbose]'), message);
  }
}

/**
 * Log section header
 */
export function section(title: string): void {
  console.log();
  console.log(chalk.bold.cyan(`━━━ ${title} ━━━`));
  console.log();
}

/**
 * Log key-value pair
 */
export function keyValue(key: string, value: string): void {
  console.log(chalk.gray(`${key}:`), chalk.white(value));
}
