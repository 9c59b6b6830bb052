/**
 * Program
 *
 * Sets up Commander.js with every command. Sanitizing the clipboard is the
 * default command, so a bare `clipscrub` cleans the clipboard.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import {
  createDeviceIdCommand,
  createLicenseCommand,
  createSanitizeCommand,
  createWatchCommand,
} from './commands/index.js';
import type { GlobalOptions } from './commands/run-settings.js';
import type { CliContext } from './context.js';
import { VERSION } from './version.js';

/**
 * Create and configure the main CLI program
 */
export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('clipscrub')
    .description('Offline clipboard sanitizer - redact emails, IPs, UUIDs, JWTs and tokens before you paste')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('--verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output');

  program.hook('preAction', (thisCommand) => {
    const globals = thisCommand.opts<GlobalOptions>();
    if (globals.color === false) {
      chalk.level = 0;
    }
  });

  program.addCommand(createSanitizeCommand(context), { isDefault: true });
  program.addCommand(createWatchCommand(context));
  program.addCommand(createDeviceIdCommand(context));
  program.addCommand(createLicenseCommand(context));

  program.addHelpText(
    'after',
    `
Examples:
  $ clipscrub                         Sanitize the clipboard in place
  $ clipscrub --stable                Use numbered placeholders such as <EMAIL_1>
  $ clipscrub --json                  Print a JSON report
  $ clipscrub --config rules.json     Apply detector settings from a config file
  $ clipscrub sanitize --file app.log Print the sanitized contents of a file
  $ cat app.log | clipscrub sanitize --stdin
  $ clipscrub watch --interval-ms 500 Keep the clipboard clean (experimental)
  $ clipscrub device-id               Print the id to send for a license
  $ clipscrub license                 Show license status and features
`
  );

  return program;
}
