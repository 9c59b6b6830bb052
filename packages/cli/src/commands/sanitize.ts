/**
 * Sanitize Command - clipscrub [sanitize]
 *
 * Sanitizes the clipboard in place (default) or prints the sanitized text
 * of stdin or a file.
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import { requireFeature, sanitize, summarize, type Feature } from 'clipscrub-core';

import type { CliContext } from '../context.js';
import { CliError, EXIT_READ } from '../errors.js';
import { JsonReporter, createReporter } from '../reporters/index.js';
import {
  reportLicense,
  resolveRunSettings,
  type GlobalOptions,
  type RunOptions,
} from './run-settings.js';

export interface SanitizeCommandOptions extends RunOptions {
  stdin?: boolean;
  file?: string;
}

type InputSource =
  | { kind: 'clipboard' }
  | { kind: 'stdin' }
  | { kind: 'file'; path: string };

const INPUT_FEATURES: Record<InputSource['kind'], Feature> = {
  clipboard: 'sanitize:clipboard',
  stdin: 'input:stdin',
  file: 'input:file',
};

function inputSource(options: SanitizeCommandOptions): InputSource {
  if (options.stdin && options.file !== undefined) {
    throw new CliError('--stdin and --file cannot be used together');
  }
  if (options.file !== undefined) return { kind: 'file', path: options.file };
  if (options.stdin) return { kind: 'stdin' };
  return { kind: 'clipboard' };
}

async function readInput(context: CliContext, source: InputSource): Promise<string> {
  switch (source.kind) {
    case 'clipboard':
      return context.clipboard().read();
    case 'stdin':
      return context.readStdin();
    case 'file':
      try {
        return fs.readFileSync(source.path, 'utf-8');
      } catch (error) {
        throw new CliError(`Failed to read ${source.path}: ${(error as Error).message}`, EXIT_READ);
      }
  }
}

/**
 * Sanitize command implementation
 */
export async function sanitizeAction(
  context: CliContext,
  options: SanitizeCommandOptions,
  globals: GlobalOptions = {}
): Promise<void> {
  const source = inputSource(options);

  const license = context.license();
  reportLicense(license, globals);
  requireFeature(license.features, INPUT_FEATURES[source.kind]);

  const settings = resolveRunSettings(options, license, globals);
  const input = await readInput(context, source);

  const result = sanitize(input, {
    registry: settings.registry,
    placeholders: settings.placeholders,
  });
  const summary = summarize(result.counts);

  if (source.kind === 'clipboard') {
    if (result.text !== input) {
      await context.clipboard().write(result.text);
    }
    console.log(createReporter(settings.format).generate(summary));
    return;
  }

  process.stdout.write(result.text);
  if (settings.format === 'json') {
    console.error(new JsonReporter().generate(summary));
  }
}

export function createSanitizeCommand(context: CliContext): Command {
  return new Command('sanitize')
    .description('Sanitize the clipboard in place (default), or print sanitized stdin or file text')
    .option('--stdin', 'Read text from stdin and print the sanitized text (Pro)')
    .option('--file <path>', 'Read a file and print the sanitized text (Pro)')
    .option('--json', 'Print a JSON report instead of the text summary (Pro)')
    .option('--stable', 'Use stable placeholders such as <EMAIL_1> (Pro)')
    .option('--config <path>', 'Load detector settings from a JSON config file (Pro)')
    .action(async (options: SanitizeCommandOptions, command: Command) => {
      await sanitizeAction(context, options, command.optsWithGlobals<GlobalOptions>());
    });
}
