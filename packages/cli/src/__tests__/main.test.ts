/**
 * Failure Reporting Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { ConfigError, checkFeature, FeatureNotLicensedError, formatFeatureError } from 'clipscrub-core';

import { reportFailure } from '../main.js';
import { CliError, ClipboardError, EXIT_READ, EXIT_USAGE, EXIT_WRITE, exitCodeFor } from '../errors.js';
import { createFakeContext } from './fake-context.js';

describe('exitCodeFor', () => {
  it('should map clipboard failures by operation', () => {
    expect(exitCodeFor(new ClipboardError('read', 'no clipboard'))).toBe(EXIT_READ);
    expect(exitCodeFor(new ClipboardError('write', 'xclip failed'))).toBe(EXIT_WRITE);
  });

  it('should map everything else to the usage code', () => {
    expect(exitCodeFor(new CliError('bad flags'))).toBe(EXIT_USAGE);
    expect(exitCodeFor(new ConfigError('Invalid config rules.json'))).toBe(EXIT_USAGE);
    expect(exitCodeFor('boom')).toBe(EXIT_USAGE);
  });
});

describe('reportFailure', () => {
  let stderr: MockInstance;

  beforeEach(() => {
    chalk.level = 0;
    stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should explain a missing entitlement with the license reason', () => {
    const context = createFakeContext();
    const error = new FeatureNotLicensedError(checkFeature(context.license().features, 'input:file'));

    expect(reportFailure(context, error)).toBe(1);
    expect(stderr).toHaveBeenCalledWith(
      formatFeatureError(error, 'No license file at /nowhere/license.key (free mode)')
    );
  });

  it('should print the message and return the exit code', () => {
    const code = reportFailure(createFakeContext(), new ClipboardError('write', 'Failed to write clipboard'));

    expect(code).toBe(3);
    expect(stderr).toHaveBeenCalledWith('Error: Failed to write clipboard');
  });

  it('should handle non-Error values', () => {
    expect(reportFailure(createFakeContext(), 42)).toBe(1);
    expect(stderr).toHaveBeenCalledWith('Error: An unexpected error occurred');
  });
});
