/**
 * Console messages on stderr. Reports and sanitized text go to stdout.
 */

import chalk from 'chalk';

export function warn(message: string): void {
  console.error(chalk.yellow(`⚠ ${message}`));
}

export function info(message: string): void {
  console.error(chalk.cyan(message));
}

/**
 * Diagnostics shown with --verbose
 */
export function debug(verbose: boolean | undefined, message: string): void {
  if (verbose) {
    console.error(chalk.gray(message));
  }
}

export function error(message: string): void {
  console.error(chalk.red(`Error: ${message}`));
}
