/**
 * In-process CLI context for command tests
 */

import {
  loadLicenseContext,
  type ClipboardPort,
  type LicenseOutcome,
} from 'clipscrub-core';

import type { CliContext } from '../context.js';

export const FAKE_DEVICE_ID = 'a'.repeat(32);
export const MISSING_LICENSE_PATH = '/nowhere/license.key';

export const FREE: LicenseOutcome = { status: 'missing', path: MISSING_LICENSE_PATH };
export const PRO: LicenseOutcome = { status: 'dev-override' };

export class MemoryClipboard implements ClipboardPort {
  readonly writes: string[] = [];
  reads = 0;
  /** Called after every write */
  onWrite: () => void = () => {};

  constructor(public value: string) {}

  async read(): Promise<string> {
    this.reads++;
    return this.value;
  }

  async write(text: string): Promise<void> {
    this.writes.push(text);
    this.value = text;
    this.onWrite();
  }
}

export interface FakeContext extends CliContext {
  readonly memory: MemoryClipboard;
  /** Fire the registered interrupt handlers */
  interrupt(): void;
  interruptHandlers(): number;
}

export interface FakeContextOptions {
  outcome?: LicenseOutcome;
  clipboard?: string;
  stdin?: string;
}

export function createFakeContext(options: FakeContextOptions = {}): FakeContext {
  const license = loadLicenseContext(() => options.outcome ?? FREE);
  const memory = new MemoryClipboard(options.clipboard ?? '');
  const handlers = new Set<() => void>();

  return {
    memory,
    license: () => license,
    clipboard: () => memory,
    readStdin: async () => options.stdin ?? '',
    deviceId: () => FAKE_DEVICE_ID,
    onInterrupt: (handler) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
    interrupt: () => {
      for (const handler of [...handlers]) handler();
    },
    interruptHandlers: () => handlers.size,
  };
}

export function argv(...args: string[]): string[] {
  return ['node', 'clipscrub', ...args];
}
