/**
 * License and Device Id Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import type { LicenseOutcome } from 'clipscrub-core';

import { createProgram } from '../program.js';
import type { LicenseReport } from '../commands/license.js';
import { FAKE_DEVICE_ID, PRO, argv, createFakeContext, type FakeContext } from './fake-context.js';

const VALID: LicenseOutcome = {
  status: 'valid',
  license: {
    email: 'dev@example.com',
    plan: 'pro',
    deviceId: FAKE_DEVICE_ID,
    issuedAt: '2026-01-01',
    expiry: '2026-12-31',
    signature: 'c2lnbmF0dXJl',
  },
  warnings: ['License expires in 30 days'],
  path: '/home/dev/.config/clipscrub/license.key',
};

describe('license command', () => {
  let log: MockInstance;

  beforeEach(() => {
    chalk.level = 0;
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function run(context: FakeContext, ...args: string[]): Promise<void> {
    await createProgram(context).exitOverride().parseAsync(argv(...args));
  }

  function printed(): string[] {
    return log.mock.calls.map((call) => String(call[0] ?? ''));
  }

  function jsonReport(): LicenseReport {
    return JSON.parse(printed()[0] ?? '') as LicenseReport;
  }

  describe('--format json', () => {
    it('should report the free tier when no license file exists', async () => {
      await run(createFakeContext(), 'license', '--format', 'json');

      const report = jsonReport();
      expect(report.tier).toBe('free');
      expect(report.status).toBe('missing');
      expect(report.reason).toBe('No license file at /nowhere/license.key (free mode)');
      expect(report.path).toBe('/nowhere/license.key');
      expect(report.license).toBeNull();
      expect(report.warnings).toEqual([]);
      expect(report.deviceId).toBe(FAKE_DEVICE_ID);
      expect(report.features['sanitize:clipboard']).toEqual({ tier: 'free', available: true });
      expect(report.features['input:file']).toEqual({ tier: 'pro', available: false });
    });

    it('should report license details without the signature', async () => {
      await run(createFakeContext({ outcome: VALID }), 'license', '-f', 'json');

      const report = jsonReport();
      expect(report.tier).toBe('pro');
      expect(report.status).toBe('valid');
      expect(report.reason).toBe('Licensed to dev@example.com (pro)');
      expect(report.license).toEqual({
        email: 'dev@example.com',
        plan: 'pro',
        deviceId: FAKE_DEVICE_ID,
        issuedAt: '2026-01-01',
        expiry: '2026-12-31',
      });
      expect(report.warnings).toEqual(['License expires in 30 days']);
      expect(report.features['placeholders:stable']).toEqual({ tier: 'pro', available: true });
    });

    it('should list every feature', async () => {
      await run(createFakeContext({ outcome: PRO }), 'license', '--format', 'json');

      expect(Object.keys(jsonReport().features).sort()).toEqual([
        'config:rules',
        'input:file',
        'input:stdin',
        'license:device-id',
        'placeholders:stable',
        'report:json',
        'sanitize:clipboard',
        'sanitize:watch',
      ]);
    });
  });

  describe('text format', () => {
    it('should print status lines for a valid license', async () => {
      await run(createFakeContext({ outcome: VALID }), 'license');

      const lines = printed();
      expect(lines).toContain('  Tier:      pro');
      expect(lines).toContain('  Status:    Licensed to dev@example.com (pro)');
      expect(lines).toContain('  File:      /home/dev/.config/clipscrub/license.key');
      expect(lines).toContain('  Email:     dev@example.com');
      expect(lines).toContain('  Expires:   2026-12-31');
      expect(lines).toContain(`  Device:    ${FAKE_DEVICE_ID}`);
      expect(lines).toContain('      • License expires in 30 days');
    });

    it('should point free users at their device id', async () => {
      await run(createFakeContext(), 'license');

      const lines = printed();
      expect(lines).toContain('  Tier:      free');
      expect(lines).toContain('  Send your device id to get a Pro license bound to this machine.');
      expect(lines.some((line) => line.includes('○'))).toBe(true);
    });
  });

  it('should reject an unknown format', async () => {
    await expect(run(createFakeContext(), 'license', '--format', 'xml')).rejects.toThrow(
      'Unknown format "xml" (expected text or json)'
    );
  });
});

describe('device-id command', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the device id', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createProgram(createFakeContext()).exitOverride().parseAsync(argv('device-id'));

    expect(log).toHaveBeenCalledWith(FAKE_DEVICE_ID);
  });
});

describe('--no-color', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    chalk.level = 0;
  });

  it('should turn off colors before the command runs', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    chalk.level = 1;

    await createProgram(createFakeContext()).exitOverride().parseAsync(argv('--no-color', 'device-id'));

    expect(chalk.level).toBe(0);
  });
});
