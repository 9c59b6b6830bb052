#!/usr/bin/env tsx
/**
 * Clipscrub CLI Entry Point (debug build)
 *
 * Honours CLIPSCRUB_LICENSE=DEV. Never part of the release build.
 */

import { createLicenseResolver } from 'clipscrub-core';
import { withDevOverride } from '../../../core/src/licensing/dev-override.dev.js';

import { main } from '../main.js';

await main(withDevOverride(createLicenseResolver()));
