#!/usr/bin/env node
/**
 * Clipscrub CLI Entry Point
 *
 * Release build: licenses are always verified against the embedded key.
 */

import { createLicenseResolver } from 'clipscrub-core';

import { main } from '../main.js';

await main(createLicenseResolver());
