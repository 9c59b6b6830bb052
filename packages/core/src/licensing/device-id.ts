/**
 * Device Id
 *
 * One-way, deterministic identifier of the current machine used to bind a
 * license. Derived from the OS installation id, the hostname and the user
 * name; never written anywhere by the core.
 */

import { execFileSync } from 'node:child_process';
import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';

/** Hex characters in a device id */
export const DEVICE_ID_LENGTH = 32;

export interface DeviceSignals {
  machineId: string | null;
  hostname: string;
  username: string;
}

const LINUX_MACHINE_ID_FILES = ['/etc/machine-id', '/var/lib/dbus/machine-id'];

function readFirstExisting(paths: readonly string[]): string | null {
  for (const p of paths) {
    try {
      const value = fs.readFileSync(p, 'utf-8').trim();
      if (value) return value;
    } catch {
      // Not present on this distribution
    }
  }
  return null;
}

function runQuiet(command: string, args: string[]): string | null {
  try {
    return execFileSync(command, args, {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
      timeout: 2000,
      windowsHide: true,
    });
  } catch {
    return null;
  }
}

/**
 * Installation id reported by the operating system, if any
 */
export function readMachineId(platform: NodeJS.Platform = process.platform): string | null {
  switch (platform) {
    case 'darwin': {
      const out = runQuiet('ioreg', ['-rd1', '-c', 'IOPlatformExpertDevice']);
      return out?.match(/"IOPlatformUUID"\s*=\s*"([^"]+)"/)?.[1] ?? null;
    }
    case 'win32': {
      const out = runQuiet('reg', ['query', 'HKLM\\SOFTWARE\\Microsoft\\Cryptography', '/v', 'MachineGuid']);
      return out?.match(/MachineGuid\s+REG_SZ\s+(\S+)/)?.[1] ?? null;
    }
    default:
      return readFirstExisting(LINUX_MACHINE_ID_FILES);
  }
}

function currentUsername(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env['USER'] ?? process.env['USERNAME'] ?? 'unknown-user';
  }
}

export function collectDeviceSignals(): DeviceSignals {
  return {
    machineId: readMachineId(),
    hostname: os.hostname() || 'unknown-host',
    username: currentUsername(),
  };
}

/**
 * Hash device signals into an opaque id
 */
export function deriveDeviceId(signals: DeviceSignals): string {
  const raw = [
    signals.machineId?.trim() || 'no-machine-id',
    signals.hostname.trim(),
    signals.username.trim(),
  ].join('|');

  return crypto
    .createHash('sha256')
    .update(raw)
    .digest('hex')
    .substring(0, DEVICE_ID_LENGTH);
}

/**
 * Device id of the machine this process runs on
 */
export function currentDeviceId(): string {
  return deriveDeviceId(collectDeviceSignals());
}
