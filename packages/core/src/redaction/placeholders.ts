/**
 * Placeholder Allocator
 *
 * Ephemeral mode labels a match by kind only. Stable mode keeps a
 * session-scoped map so the same value always gets the same number within
 * one allocator; nothing is persisted.
 */

import type { DetectorKind } from '../detectors/types.js';
import type { PlaceholderAssignment, PlaceholderMode } from './types.js';

export const PLACEHOLDER_LABELS: Record<DetectorKind, string> = {
  email: 'EMAIL',
  ipv4: 'IP',
  ipv6: 'IPV6',
  uuid: 'UUID',
  jwt: 'JWT',
  token: 'TOKEN',
};

/**
 * Key under which a matched value is remembered in stable mode
 */
export function normalizeValue(kind: DetectorKind, value: string): string {
  switch (kind) {
    case 'email':
    case 'uuid':
    case 'ipv6':
      return value.toLowerCase();
    case 'ipv4':
    case 'jwt':
    case 'token':
      return value;
  }
}

export function renderPlaceholder(assignment: PlaceholderAssignment): string {
  const label = PLACEHOLDER_LABELS[assignment.kind];
  return assignment.index > 0 ? `<${label}_${assignment.index}>` : `<${label}>`;
}

export interface PlaceholderAllocator {
  readonly mode: PlaceholderMode;
  assign(kind: DetectorKind, value: string): PlaceholderAssignment;
}

class EphemeralAllocator implements PlaceholderAllocator {
  readonly mode = 'ephemeral' as const;

  assign(kind: DetectorKind): PlaceholderAssignment {
    return { kind, index: 0 };
  }
}

class StableAllocator implements PlaceholderAllocator {
  readonly mode = 'stable' as const;
  private readonly indices = new Map<DetectorKind, Map<string, number>>();

  assign(kind: DetectorKind, value: string): PlaceholderAssignment {
    const stableKey = normalizeValue(kind, value);

    let seen = this.indices.get(kind);
    if (!seen) {
      seen = new Map();
      this.indices.set(kind, seen);
    }

    let index = seen.get(stableKey);
    if (index === undefined) {
      index = seen.size + 1;
      seen.set(stableKey, index);
    }

    return { kind, index, stableKey };
  }
}

export function createPlaceholderAllocator(mode: PlaceholderMode = 'ephemeral'): PlaceholderAllocator {
  return mode === 'stable' ? new StableAllocator() : new EphemeralAllocator();
}
