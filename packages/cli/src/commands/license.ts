/**
 * License Command - clipscrub license
 *
 * Display license status and available features.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  FEATURE_TIERS,
  type Feature,
  type LicenseContext,
  type LicenseTier,
} from 'clipscrub-core';

import type { CliContext } from '../context.js';
import { CliError } from '../errors.js';
import { createFeaturesTable, formatTier } from '../ui/table.js';

export interface LicenseCommandOptions {
  /** Output format */
  format?: string;
}

export interface LicenseReport {
  tier: LicenseTier;
  status: LicenseContext['outcome']['status'];
  reason: string;
  path: string | null;
  license: {
    email: string;
    plan: string;
    deviceId: string;
    issuedAt: string;
    expiry: string | null;
  } | null;
  warnings: string[];
  deviceId: string;
  features: Record<string, { tier: LicenseTier; available: boolean }>;
}

/**
 * Machine-readable license status
 */
export function buildLicenseReport(license: LicenseContext, deviceId: string): LicenseReport {
  const { outcome, features } = license;

  const featureReport: LicenseReport['features'] = {};
  for (const feature of Object.keys(FEATURE_TIERS) as Feature[]) {
    featureReport[feature] = { tier: FEATURE_TIERS[feature], available: features.has(feature) };
  }

  return {
    tier: features.tier,
    status: outcome.status,
    reason: license.reason,
    path: 'path' in outcome && outcome.path !== undefined ? outcome.path : null,
    license:
      outcome.status === 'valid'
        ? {
            email: outcome.license.email,
            plan: outcome.license.plan,
            deviceId: outcome.license.deviceId,
            issuedAt: outcome.license.issuedAt,
            expiry: outcome.license.expiry ?? null,
          }
        : null,
    warnings: outcome.status === 'valid' ? outcome.warnings : [],
    deviceId,
    features: featureReport,
  };
}

function printLicenseReport(report: LicenseReport, license: LicenseContext): void {
  console.log();
  console.log(chalk.bold('🔑 Clipscrub License Status'));
  console.log(chalk.gray('─'.repeat(50)));
  console.log();

  console.log(`  Tier:      ${formatTier(report.tier)}`);
  console.log(`  Status:    ${report.reason}`);
  if (report.path) {
    console.log(`  File:      ${chalk.gray(report.path)}`);
  }
  if (report.license) {
    console.log(`  Email:     ${chalk.cyan(report.license.email)}`);
    console.log(`  Plan:      ${report.license.plan}`);
    console.log(`  Issued:    ${report.license.issuedAt}`);
    console.log(`  Expires:   ${report.license.expiry ?? 'never'}`);
  }
  console.log(`  Device:    ${report.deviceId}`);

  if (report.warnings.length > 0) {
    console.log();
    console.log(chalk.yellow('  ⚠️  Warnings:'));
    for (const warning of report.warnings) {
      console.log(chalk.yellow(`      • ${warning}`));
    }
  }

  console.log();
  console.log(createFeaturesTable(license.features));

  if (report.tier !== 'pro') {
    console.log();
    console.log(`  ${chalk.cyan('Send your device id to get a Pro license bound to this machine.')}`);
  }
  console.log();
}

/**
 * License command implementation
 */
export function licenseAction(context: CliContext, options: LicenseCommandOptions): void {
  const format = options.format ?? 'text';
  if (format !== 'text' && format !== 'json') {
    throw new CliError(`Unknown format "${format}" (expected text or json)`);
  }

  const license = context.license();
  const report = buildLicenseReport(license, context.deviceId());

  if (format === 'json') {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  printLicenseReport(report, license);
}

export function createLicenseCommand(context: CliContext): Command {
  return new Command('license')
    .description('Display license status and available features')
    .option('-f, --format <format>', 'Output format (text, json)', 'text')
    .action((options: LicenseCommandOptions) => {
      licenseAction(context, options);
    });
}
