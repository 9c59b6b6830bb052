/**
 * Watch Command - clipscrub watch
 *
 * Experimental: polls the clipboard and sanitizes it whenever it holds
 * something sensitive, until interrupted.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  ClipboardWatcher,
  DEFAULT_INTERVAL_MS,
  MIN_INTERVAL_MS,
  requireFeature,
  summarize,
  type RedactionResult,
} from 'clipscrub-core';

import type { CliContext } from '../context.js';
import { createReporter } from '../reporters/index.js';
import { debug, error as printError, info } from '../ui/messages.js';
import {
  reportLicense,
  resolveRunSettings,
  type GlobalOptions,
  type RunOptions,
} from './run-settings.js';

export interface WatchCommandOptions extends RunOptions {
  intervalMs?: number;
}

export function parseInterval(value: string): number {
  const interval = Number(value);
  if (!Number.isInteger(interval) || interval < MIN_INTERVAL_MS) {
    throw new InvalidArgumentError(`Must be an integer >= ${MIN_INTERVAL_MS}.`);
  }
  return interval;
}

/**
 * Watch command implementation
 */
export async function watchAction(
  context: CliContext,
  options: WatchCommandOptions,
  globals: GlobalOptions = {}
): Promise<void> {
  const license = context.license();
  reportLicense(license, globals);
  requireFeature(license.features, 'sanitize:watch');

  const settings = resolveRunSettings(options, license, globals);
  const intervalMs = options.intervalMs ?? settings.intervalMs ?? DEFAULT_INTERVAL_MS;
  const reporter = createReporter(settings.format);

  const watcher = new ClipboardWatcher({
    clipboard: context.clipboard(),
    intervalMs,
    registry: settings.registry,
    placeholders: settings.placeholders,
  });

  watcher.on('sanitized', (result: RedactionResult) => {
    console.log(reporter.generate(summarize(result.counts)));
  });
  watcher.on('stale', () => {
    debug(globals.verbose, 'Clipboard changed while sanitizing; left untouched');
  });
  watcher.on('error', (err: unknown) => {
    printError(err instanceof Error ? err.message : String(err));
  });

  const controller = new AbortController();
  const dispose = context.onInterrupt(() => controller.abort());

  info(`Watching clipboard every ${intervalMs}ms (experimental). Press Ctrl+C to stop.`);
  try {
    await watcher.run(controller.signal);
  } finally {
    dispose();
  }
  console.error(chalk.gray('Stopped watching clipboard'));
}

export function createWatchCommand(context: CliContext): Command {
  return new Command('watch')
    .description('Watch the clipboard and sanitize it on change (experimental)')
    .option('--interval-ms <ms>', `Poll interval in milliseconds (default: ${DEFAULT_INTERVAL_MS})`, parseInterval)
    .option('--json', 'Print a JSON report per sanitization (Pro)')
    .option('--stable', 'Use stable placeholders such as <EMAIL_1> (Pro)')
    .option('--config <path>', 'Load detector settings from a JSON config file (Pro)')
    .action(async (options: WatchCommandOptions, command: Command) => {
      await watchAction(context, options, command.optsWithGlobals<GlobalOptions>());
    });
}
