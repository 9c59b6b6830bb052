/**
 * Config Loader Tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConfigError,
  loadConfig,
  parseConfig,
  toDetectorOptions,
  validateConfig,
} from '../config-loader.js';
import { DetectorRegistry } from '../../detectors/registry.js';

describe('config loader', () => {
  describe('validateConfig', () => {
    it('should accept a complete config', () => {
      const raw = {
        stablePlaceholders: true,
        jsonReport: false,
        intervalMs: 500,
        detectors: { token: false },
        entropy: { minLength: 40, threshold: 4 },
        allowList: ['acme'],
      };
      expect(validateConfig(raw)).toEqual({ config: raw, errors: [] });
    });

    it('should reject non-object configs', () => {
      expect(validateConfig([]).errors).toEqual(['Config must be a JSON object']);
    });

    it('should collect every problem', () => {
      const { errors } = validateConfig({
        stable: true,
        jsonReport: 'yes',
        intervalMs: 50,
        detectors: { phone: true, email: 1 },
        entropy: { minLength: 0, threshold: -1, ratio: 2 },
        allowList: ['ok', 3],
      });

      expect(errors).toEqual([
        'Unknown config key "stable"',
        '"jsonReport" must be a boolean',
        '"intervalMs" must be an integer >= 100',
        'Unknown detector "phone" (expected one of email, ipv4, ipv6, uuid, jwt, token)',
        '"detectors.email" must be a boolean',
        'Unknown entropy key "ratio"',
        '"entropy.minLength" must be a positive integer',
        '"entropy.threshold" must be a non-negative number',
        '"allowList" must be an array of strings',
      ]);
    });
  });

  describe('parseConfig', () => {
    it('should wrap JSON syntax errors', () => {
      expect(() => parseConfig('{ nope', 'rules.json')).toThrow(ConfigError);
      expect(() => parseConfig('{ nope', 'rules.json')).toThrow('Invalid JSON in rules.json');
    });

    it('should list validation errors on the thrown error', () => {
      let caught: unknown;
      try {
        parseConfig('{"intervalMs": 10, "extra": 1}', 'rules.json');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (!(caught instanceof ConfigError)) return;
      expect(caught.errors).toEqual(['Unknown config key "extra"', '"intervalMs" must be an integer >= 100']);
      expect(caught.message).toBe(
        'Invalid config rules.json: Unknown config key "extra"; "intervalMs" must be an integer >= 100'
      );
    });
  });

  describe('loadConfig', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipscrub-config-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should read a config file', () => {
      const configPath = path.join(tempDir, 'clipscrub.json');
      fs.writeFileSync(configPath, JSON.stringify({ stablePlaceholders: true }));
      expect(loadConfig(configPath)).toEqual({ stablePlaceholders: true });
    });

    it('should fail on a missing file', () => {
      const configPath = path.join(tempDir, 'missing.json');
      expect(() => loadConfig(configPath)).toThrow(`Failed to read config ${configPath}`);
    });
  });

  describe('toDetectorOptions', () => {
    it('should return no overrides for an empty config', () => {
      expect(toDetectorOptions({})).toEqual({});
    });

    it('should disable switched-off kinds', () => {
      const registry = new DetectorRegistry(toDetectorOptions({ detectors: { token: false, ipv6: false } }));
      expect(registry.kinds()).toEqual(['email', 'ipv4', 'uuid', 'jwt']);
    });

    it('should extend the shipped allow-list', () => {
      const options = toDetectorOptions({ allowList: ['AcmeCorp'] });
      expect(options.allowList?.has('acmecorp')).toBe(true);
      expect(options.allowList?.has('function')).toBe(true);
    });

    it('should pass entropy settings through', () => {
      const registry = new DetectorRegistry(toDetectorOptions({ entropy: { minLength: 20 } }));
      expect(registry.options.entropy).toEqual({ minLength: 20, threshold: 3.5 });
    });
  });
});
