/**
 * License Verifier
 *
 * Verifies an offline license file against the embedded public key, then
 * checks device binding and expiry. A bad license never throws: it comes
 * back as an `invalid` outcome and the caller continues on the free tier.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { currentDeviceId } from './device-id.js';
import {
  LicenseParseError,
  parseLicenseEnvelope,
  parseLicensePayload,
  toLicense,
  type LicenseEnvelope,
} from './license-file.js';
import type { LicenseFields, LicenseOutcome } from './types.js';

// =============================================================================
// Constants
// =============================================================================

export const LICENSE_PATH_ENV = 'CLIPSCRUB_LICENSE_FILE';
const LICENSE_DIR = 'clipscrub';
const LICENSE_FILE = 'license.key';

const DAY_MS = 24 * 60 * 60 * 1000;
const EXPIRY_WARNING_DAYS = 30;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// =============================================================================
// Paths
// =============================================================================

/**
 * Fixed per-user license location: `$XDG_CONFIG_HOME/clipscrub/license.key`,
 * falling back to `~/.config/clipscrub/license.key`.
 */
export function defaultLicensePath(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): string {
  const override = env[LICENSE_PATH_ENV];
  if (override) return override;

  const configHome = env['XDG_CONFIG_HOME'] || path.join(homeDir, '.config');
  return path.join(configHome, LICENSE_DIR, LICENSE_FILE);
}

// =============================================================================
// Keys
// =============================================================================

/**
 * Load a raw 32-byte Ed25519 public key given in base64
 */
export function loadPublicKey(rawBase64: string): crypto.KeyObject {
  const raw = Buffer.from(rawBase64, 'base64');
  if (raw.length !== 32) {
    throw new Error(`Invalid public key length (${raw.length} bytes, expected 32)`);
  }
  return crypto.createPublicKey({
    key: { kty: 'OKP', crv: 'Ed25519', x: raw.toString('base64url') },
    format: 'jwk',
  });
}

/**
 * Instant after which a license is expired
 */
export function expiryInstant(expiry: string): number {
  if (DATE_ONLY.test(expiry)) {
    return Date.parse(`${expiry}T00:00:00Z`) + DAY_MS;
  }
  return Date.parse(expiry);
}

// =============================================================================
// License Verifier
// =============================================================================

export interface LicenseVerifierOptions {
  /** Base64 raw Ed25519 key or a loaded key object */
  publicKey: string | crypto.KeyObject;
  /** Device id of this machine (default: derived on first use) */
  deviceId?: string | (() => string);
  /** Clock (default: `new Date()`) */
  now?: () => Date;
}

export class LicenseVerifier {
  private readonly publicKey: string | crypto.KeyObject;
  private readonly deviceId: () => string;
  private readonly now: () => Date;

  constructor(options: LicenseVerifierOptions) {
    this.publicKey = options.publicKey;
    const deviceId = options.deviceId ?? currentDeviceId;
    this.deviceId = typeof deviceId === 'string' ? () => deviceId : deviceId;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Verify the license file at `filePath`; an absent file is not an error
   */
  verifyFile(filePath: string): LicenseOutcome {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return { status: 'missing', path: filePath };
      }
      return {
        status: 'invalid',
        reason: 'parse',
        message: `Cannot read license file: ${(error as Error).message}`,
        path: filePath,
      };
    }

    return { ...this.verify(content), path: filePath };
  }

  /**
   * Verify license file content
   */
  verify(content: string): Exclude<LicenseOutcome, { status: 'missing' } | { status: 'dev-override' }> {
    // 1. Structure
    let envelope: LicenseEnvelope;
    try {
      envelope = parseLicenseEnvelope(content);
    } catch (error) {
      return this.parseFailure(error);
    }

    // 2. Signature over the exact payload bytes
    if (!this.verifySignature(envelope.payload, envelope.signature)) {
      return {
        status: 'invalid',
        reason: 'signature-invalid',
        message: 'License signature check failed',
      };
    }

    // 3. Signed fields
    let fields: LicenseFields;
    try {
      fields = parseLicensePayload(envelope.payload);
    } catch (error) {
      return this.parseFailure(error);
    }

    // 4. Device binding
    if (fields.deviceId !== this.deviceId()) {
      return {
        status: 'invalid',
        reason: 'device-mismatch',
        message: 'License is not valid for this device',
      };
    }

    // 5. Expiry
    const warnings: string[] = [];
    if (fields.expiry !== undefined) {
      const remainingMs = expiryInstant(fields.expiry) - this.now().getTime();
      if (remainingMs <= 0) {
        return {
          status: 'invalid',
          reason: 'expired',
          message: `License expired on ${fields.expiry}`,
        };
      }
      const daysLeft = Math.ceil(remainingMs / DAY_MS);
      if (daysLeft <= EXPIRY_WARNING_DAYS) {
        warnings.push(`License expires in ${daysLeft} day${daysLeft === 1 ? '' : 's'}`);
      }
    }

    return {
      status: 'valid',
      license: toLicense(fields, envelope.signature),
      warnings,
    };
  }

  private verifySignature(payload: Buffer, signature: Buffer): boolean {
    try {
      const key = typeof this.publicKey === 'string' ? loadPublicKey(this.publicKey) : this.publicKey;
      return crypto.verify(null, payload, key, signature);
    } catch {
      // A key that cannot be loaded verifies nothing.
      return false;
    }
  }

  private parseFailure(error: unknown): Extract<LicenseOutcome, { status: 'invalid' }> {
    if (error instanceof LicenseParseError) {
      return { status: 'invalid', reason: 'parse', message: error.message };
    }
    throw error;
  }
}
