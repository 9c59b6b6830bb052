/**
 * Table - Table formatting for output
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import {
  FEATURE_TIERS,
  type Feature,
  type FeatureSet,
  type LicenseTier,
} from 'clipscrub-core';

/**
 * Table style presets
 */
export type TableStyle = 'default' | 'borderless';

/**
 * Table configuration options
 */
export interface TableOptions {
  /** Table headers */
  head?: string[];
  /** Column alignments */
  colAligns?: Array<'left' | 'center' | 'right'>;
  /** Table style preset */
  style?: TableStyle;
}

const BORDERLESS_CHARS: Partial<Record<Table.CharName, string>> = {
  top: '',
  'top-mid': '',
  'top-left': '',
  'top-right': '',
  bottom: '',
  'bottom-mid': '',
  'bottom-left': '',
  'bottom-right': '',
  left: '',
  'left-mid': '',
  mid: '',
  'mid-mid': '',
  right: '',
  'right-mid': '',
  middle: ' ',
};

/**
 * Create a formatted table
 */
export function createTable(options: TableOptions = {}): Table.Table {
  const style = options.style ?? 'default';

  const tableConfig: Table.TableConstructorOptions = {
    style: {
      'padding-left': 1,
      'padding-right': 1,
      head: ['cyan'],
      border: style === 'borderless' ? [] : ['gray'],
    },
    wordWrap: true,
  };

  if (options.head) {
    tableConfig.head = options.head;
  }
  if (options.colAligns) {
    tableConfig.colAligns = options.colAligns;
  }
  if (style === 'borderless') {
    tableConfig.chars = BORDERLESS_CHARS;
  }

  return new Table(tableConfig);
}

/**
 * Format a tier with color
 */
export function formatTier(tier: LicenseTier): string {
  switch (tier) {
    case 'pro':
      return chalk.magenta.bold(tier);
    case 'free':
      return chalk.green.bold(tier);
  }
}

/**
 * Features with the tier they need and whether they are unlocked
 */
export function createFeaturesTable(features: FeatureSet): string {
  const table = createTable({
    head: ['Feature', 'Tier', 'Available'],
    colAligns: ['left', 'left', 'center'],
  });

  for (const feature of Object.keys(FEATURE_TIERS) as Feature[]) {
    const available = features.has(feature);
    const tier = FEATURE_TIERS[feature];
    table.push([
      available ? feature : chalk.gray(feature),
      formatTier(tier),
      available ? chalk.green('✓') : chalk.gray('○'),
    ]);
  }

  return table.toString();
}
