/**
 * License File Format
 *
 * ```
 * CLIPSCRUB-LICENSE-1
 * payload:<base64 canonical payload>
 * signature:<base64 Ed25519 signature over the payload bytes>
 * ```
 *
 * The canonical payload is `key=value` lines in a fixed order:
 * `email`, `plan`, `device_id`, `issued_at`, then `expires` when present,
 * each terminated by `\n`, UTF-8 encoded.
 */

import type { License, LicenseFields } from './types.js';

export const LICENSE_HEADER = 'CLIPSCRUB-LICENSE-1';
export const SIGNATURE_LENGTH = 64;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2}))?$/;

/**
 * Structure of a license file that failed to parse
 */
export class LicenseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LicenseParseError';
  }
}

/**
 * Decoded but not yet verified license file
 */
export interface LicenseEnvelope {
  payload: Buffer;
  signature: Buffer;
}

// =============================================================================
// Envelope
// =============================================================================

function decodeBase64(value: string, what: string): Buffer {
  if (value.length % 4 !== 0 || !BASE64_PATTERN.test(value)) {
    throw new LicenseParseError(`Invalid license ${what} encoding`);
  }
  return Buffer.from(value, 'base64');
}

function stripPrefix(line: string | undefined, prefix: string, what: string): string {
  if (line === undefined) {
    throw new LicenseParseError(`Invalid license file (missing ${what})`);
  }
  if (!line.startsWith(prefix)) {
    throw new LicenseParseError(`Invalid license file (${what} prefix)`);
  }
  return line.slice(prefix.length).trim();
}

/**
 * Split a license file into its payload and signature bytes
 */
export function parseLicenseEnvelope(content: string): LicenseEnvelope {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const [header, payloadLine, signatureLine, ...rest] = lines;
  if (header === undefined) {
    throw new LicenseParseError('Invalid license file (missing header)');
  }
  if (header !== LICENSE_HEADER) {
    throw new LicenseParseError('Invalid license file header');
  }

  const payload = decodeBase64(stripPrefix(payloadLine, 'payload:', 'payload'), 'payload');
  const signature = decodeBase64(stripPrefix(signatureLine, 'signature:', 'signature'), 'signature');

  if (rest.length > 0) {
    throw new LicenseParseError('Invalid license file (unexpected trailing lines)');
  }
  if (signature.length !== SIGNATURE_LENGTH) {
    throw new LicenseParseError(`Invalid license signature length (${signature.length} bytes)`);
  }

  return { payload, signature };
}

// =============================================================================
// Payload
// =============================================================================

/**
 * Canonical byte encoding of the signed fields
 */
export function serializeLicensePayload(fields: LicenseFields): Buffer {
  const lines = [
    `email=${fields.email}`,
    `plan=${fields.plan}`,
    `device_id=${fields.deviceId}`,
    `issued_at=${fields.issuedAt}`,
  ];
  if (fields.expiry !== undefined) {
    lines.push(`expires=${fields.expiry}`);
  }
  return Buffer.from(lines.map((line) => `${line}\n`).join(''), 'utf-8');
}

/**
 * Parse a verified payload into the license fields.
 *
 * Rejects anything that does not re-serialize to the exact signed bytes,
 * so two different byte strings can never decode to the same license.
 */
export function parseLicensePayload(payload: Buffer): LicenseFields {
  const text = payload.toString('utf-8');
  const values = new Map<string, string>();

  for (const line of text.split('\n')) {
    if (line === '') continue;
    const eq = line.indexOf('=');
    if (eq <= 0) {
      throw new LicenseParseError(`Invalid license payload line: "${line}"`);
    }
    const key = line.slice(0, eq);
    if (values.has(key)) {
      throw new LicenseParseError(`Duplicate license field "${key}"`);
    }
    values.set(key, line.slice(eq + 1));
  }

  const required = (key: string): string => {
    const value = values.get(key);
    if (!value) {
      throw new LicenseParseError(`License is missing "${key}"`);
    }
    return value;
  };

  const fields: LicenseFields = {
    email: required('email'),
    plan: required('plan'),
    deviceId: required('device_id'),
    issuedAt: required('issued_at'),
  };
  const expiry = values.get('expires');
  if (expiry !== undefined) {
    fields.expiry = expiry;
  }

  for (const [key, value] of [['issued_at', fields.issuedAt], ['expires', fields.expiry]] as const) {
    if (value !== undefined && (!ISO_DATE_PATTERN.test(value) || Number.isNaN(Date.parse(value)))) {
      throw new LicenseParseError(`Invalid license date in "${key}": ${value}`);
    }
  }

  if (!serializeLicensePayload(fields).equals(payload)) {
    throw new LicenseParseError('License payload is not in canonical form');
  }

  return fields;
}

/**
 * Render a complete license file
 */
export function formatLicenseFile(fields: LicenseFields, signature: Buffer): string {
  return [
    LICENSE_HEADER,
    `payload:${serializeLicensePayload(fields).toString('base64')}`,
    `signature:${signature.toString('base64')}`,
    '',
  ].join('\n');
}

export function toLicense(fields: LicenseFields, signature: Buffer): License {
  return { ...fields, signature: signature.toString('base64') };
}
