import { describe, it, expect, vi } from 'vitest';
import { DEV_LICENSE_ENV, withDevOverride } from '../dev-override.dev.js';
import type { LicenseOutcome } from '../types.js';

describe('withDevOverride', () => {
  const missing: LicenseOutcome = { status: 'missing', path: '/tmp/license.key' };

  it('should force the override without reading a license', () => {
    const resolve = vi.fn(() => missing);
    const outcome = withDevOverride(resolve, { [DEV_LICENSE_ENV]: 'DEV' })();

    expect(outcome).toEqual({ status: 'dev-override' });
    expect(resolve).not.toHaveBeenCalled();
  });

  it('should defer to the wrapped resolver otherwise', () => {
    expect(withDevOverride(() => missing, {})()).toBe(missing);
    expect(withDevOverride(() => missing, { [DEV_LICENSE_ENV]: 'dev' })()).toBe(missing);
  });
});
