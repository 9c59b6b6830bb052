/**
 * CLI Context
 *
 * Everything a command needs from the outside world. The entry points
 * build the real one; tests pass their own.
 */

import {
  currentDeviceId,
  loadLicenseContext,
  type ClipboardPort,
  type LicenseContext,
  type LicenseResolver,
} from 'clipscrub-core';

import { detectSystemClipboard } from './clipboard/system-clipboard.js';
import { CliError, EXIT_READ } from './errors.js';

export interface CliContext {
  /** License state, verified once per process */
  license(): LicenseContext;
  clipboard(): ClipboardPort;
  readStdin(): Promise<string>;
  deviceId(): string;
  /** Register an interrupt handler; returns the unregister function */
  onInterrupt(handler: () => void): () => void;
}

export interface CliContextOptions {
  resolveLicense: LicenseResolver;
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  } catch (error) {
    throw new CliError(`Failed to read stdin: ${(error as Error).message}`, EXIT_READ);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function createCliContext(options: CliContextOptions): CliContext {
  let license: LicenseContext | undefined;
  let clipboard: ClipboardPort | undefined;

  return {
    license: () => {
      if (!license) {
        license = loadLicenseContext(options.resolveLicense);
      }
      return license;
    },
    clipboard: () => {
      if (!clipboard) {
        clipboard = detectSystemClipboard();
      }
      return clipboard;
    },
    readStdin: readProcessStdin,
    deviceId: currentDeviceId,
    onInterrupt: (handler) => {
      process.once('SIGINT', handler);
      return () => {
        process.off('SIGINT', handler);
      };
    },
  };
}
