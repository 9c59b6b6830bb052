/**
 * System Clipboard
 *
 * {@link ClipboardPort} backed by a command-line clipboard utility.
 */

import { spawn } from 'node:child_process';
import type { ClipboardPort } from 'clipscrub-core';

import { ClipboardError } from '../errors.js';
import {
  BACKENDS,
  NO_BACKEND_MESSAGE,
  backendAvailable,
  commandExists,
  displayEnvironment,
  pickBackend,
  type ClipboardBackend,
  type ClipboardCommand,
} from './backends.js';

function describeFailure(command: ClipboardCommand, code: number | null, stderr: string): string {
  const details = stderr.trim();
  const status = code === null ? 'was terminated' : `exited with code ${code}`;
  return `${command.command} ${status}${details ? `. Details: ${details}` : ''}`;
}

function runRead(command: ClipboardCommand): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command.command, command.args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout).toString('utf-8'));
      } else {
        reject(new Error(describeFailure(command, code, Buffer.concat(stderr).toString('utf-8'))));
      }
    });
  });
}

function runWrite(command: ClipboardCommand, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    // Output is ignored: wl-copy and xclip fork a process that keeps serving
    // the selection, and it would hold a piped stdout open.
    const child = spawn(command.command, command.args, {
      stdio: ['pipe', 'ignore', 'ignore'],
      windowsHide: true,
    });

    child.on('error', reject);
    child.on('exit', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(describeFailure(command, code, '')));
      }
    });
    child.stdin.on('error', reject);
    child.stdin.end(text, 'utf-8');
  });
}

export class SystemClipboard implements ClipboardPort {
  constructor(readonly backend: ClipboardBackend) {}

  async read(): Promise<string> {
    const failures: string[] = [];
    for (const command of this.backend.read) {
      try {
        return await runRead(command);
      } catch (error) {
        failures.push((error as Error).message);
      }
    }
    throw new ClipboardError('read', `Failed to read clipboard: ${failures.join('; ')}`);
  }

  async write(text: string): Promise<void> {
    try {
      await runWrite(this.backend.write, text);
    } catch (error) {
      throw new ClipboardError('write', `Failed to write clipboard: ${(error as Error).message}`);
    }
  }
}

/**
 * Clipboard for this session, or a {@link ClipboardError} when no
 * supported utility is installed
 */
export function detectSystemClipboard(env: NodeJS.ProcessEnv = process.env): SystemClipboard {
  const name = pickBackend(displayEnvironment(env), (backend) =>
    backendAvailable(backend, (command) => commandExists(command, env))
  );
  if (!name) {
    throw new ClipboardError('read', NO_BACKEND_MESSAGE);
  }
  return new SystemClipboard(BACKENDS[name]);
}
