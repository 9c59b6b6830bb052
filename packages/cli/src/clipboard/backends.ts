/**
 * Clipboard Backends
 *
 * Command-line clipboard utilities the CLI can drive, and the choice
 * between them for the current session.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type BackendName = 'pbcopy' | 'wl-clipboard' | 'xclip' | 'xsel';

export interface ClipboardCommand {
  command: string;
  args: string[];
}

export interface ClipboardBackend {
  name: BackendName;
  /** Tried in order until one succeeds */
  read: ClipboardCommand[];
  write: ClipboardCommand;
}

export const BACKENDS: Record<BackendName, ClipboardBackend> = {
  pbcopy: {
    name: 'pbcopy',
    read: [{ command: 'pbpaste', args: [] }],
    write: { command: 'pbcopy', args: [] },
  },
  'wl-clipboard': {
    name: 'wl-clipboard',
    read: [{ command: 'wl-paste', args: ['--no-newline'] }],
    write: { command: 'wl-copy', args: [] },
  },
  // The primary selection is the fallback when the clipboard is empty.
  xclip: {
    name: 'xclip',
    read: [
      { command: 'xclip', args: ['-selection', 'clipboard', '-o'] },
      { command: 'xclip', args: ['-selection', 'primary', '-o'] },
    ],
    write: { command: 'xclip', args: ['-selection', 'clipboard'] },
  },
  xsel: {
    name: 'xsel',
    read: [
      { command: 'xsel', args: ['--clipboard', '--output'] },
      { command: 'xsel', args: ['--primary', '--output'] },
    ],
    write: { command: 'xsel', args: ['--clipboard', '--input'] },
  },
};

export const NO_BACKEND_MESSAGE =
  'No supported clipboard utilities found. Install pbpaste/pbcopy (macOS), ' +
  'wl-paste/wl-copy (Wayland), or xclip/xsel (X11).';

export interface DisplayEnvironment {
  wayland: boolean;
  x11: boolean;
}

export function displayEnvironment(env: NodeJS.ProcessEnv = process.env): DisplayEnvironment {
  return {
    wayland: Boolean(env['WAYLAND_DISPLAY']),
    x11: Boolean(env['DISPLAY']),
  };
}

/**
 * Choose a backend: pbcopy first, then the tools matching the running
 * display server, then whatever is installed.
 */
export function pickBackend(
  display: DisplayEnvironment,
  isAvailable: (name: BackendName) => boolean
): BackendName | null {
  const order: BackendName[] = ['pbcopy'];
  if (display.wayland) order.push('wl-clipboard');
  if (display.x11) order.push('xclip', 'xsel');
  order.push('wl-clipboard', 'xclip', 'xsel');

  return order.find((name) => isAvailable(name)) ?? null;
}

/**
 * Whether an executable named `command` is on the PATH
 */
export function commandExists(command: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const dirs = (env['PATH'] ?? '').split(path.delimiter).filter(Boolean);
  return dirs.some((dir) => {
    try {
      fs.accessSync(path.join(dir, command), fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  });
}

/**
 * Whether every command a backend runs is installed
 */
export function backendAvailable(
  name: BackendName,
  exists: (command: string) => boolean = commandExists
): boolean {
  const backend = BACKENDS[name];
  const commands = new Set([...backend.read.map((c) => c.command), backend.write.command]);
  return [...commands].every((command) => exists(command));
}
