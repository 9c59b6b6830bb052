/**
 * Shared body of the release and debug entry points. They differ only in
 * the license resolver they pass in.
 */

import { FeatureNotLicensedError, formatFeatureError, type LicenseResolver } from 'clipscrub-core';

import { createCliContext, type CliContext } from './context.js';
import { exitCodeFor } from './errors.js';
import { createProgram } from './program.js';
import { error as printError } from './ui/messages.js';

/**
 * Print an error that ended a command and return its exit code
 */
export function reportFailure(context: CliContext, error: unknown): number {
  if (error instanceof FeatureNotLicensedError) {
    console.error(formatFeatureError(error, context.license().reason));
  } else if (error instanceof Error) {
    printError(error.message);
    if (process.env['DEBUG']) {
      console.error(error.stack);
    }
  } else {
    printError('An unexpected error occurred');
  }
  return exitCodeFor(error);
}

/**
 * Main entry point
 */
export async function main(
  resolveLicense: LicenseResolver,
  argv: string[] = process.argv
): Promise<void> {
  const context = createCliContext({ resolveLicense });
  const program = createProgram(context);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    process.exitCode = reportFailure(context, error);
  }
}
