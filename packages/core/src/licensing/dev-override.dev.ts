/**
 * Development License Override
 *
 * Debug builds only. Each package's `tsconfig.build.json` drops every
 * `*.dev.ts`, the package manifest does not export it, and only the debug
 * entry point imports it (by relative path from the workspace).
 */

import type { LicenseOutcome } from './types.js';

export const DEV_LICENSE_ENV = 'CLIPSCRUB_LICENSE';
const DEV_LICENSE_VALUE = 'DEV';

/**
 * Wrap a license resolver so `CLIPSCRUB_LICENSE=DEV` forces the paid tier
 * without reading or verifying any license file.
 */
export function withDevOverride(
  resolve: () => LicenseOutcome,
  env: NodeJS.ProcessEnv = process.env
): () => LicenseOutcome {
  return () => {
    if (env[DEV_LICENSE_ENV]?.trim() === DEV_LICENSE_VALUE) {
      return { status: 'dev-override' };
    }
    return resolve();
  };
}
