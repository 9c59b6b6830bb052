/**
 * Clipboard Watcher
 *
 * Experimental polling loop: sanitizes the clipboard whenever it holds
 * something sensitive. Emits `sanitized`, `stale` and `error` events.
 *
 * Nothing is remembered between polls. Because redaction is idempotent an
 * already clean clipboard re-sanitizes to itself and is left alone.
 */

import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';

import { DetectorRegistry } from '../detectors/registry.js';
import { createPlaceholderAllocator, type PlaceholderAllocator } from '../redaction/placeholders.js';
import { redact } from '../redaction/redactor.js';
import type { PlaceholderMode, RedactionResult } from '../redaction/types.js';
import { DEFAULT_INTERVAL_MS, MIN_INTERVAL_MS } from '../config/config-loader.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Narrow clipboard access the watcher needs
 */
export interface ClipboardPort {
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ClipboardWatcherOptions {
  clipboard: ClipboardPort;
  /** Poll interval in milliseconds (default: 750, minimum: 100) */
  intervalMs?: number;
  registry?: DetectorRegistry;
  placeholders?: PlaceholderMode;
  sleep?: Sleep;
}

export type PollResult = 'clean' | 'sanitized' | 'stale' | 'error';

/** Payload of the `stale` event */
export interface StaleWrite {
  /** Text that would have been written */
  discarded: string;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : {});
};

// ============================================================================
// Clipboard Watcher
// ============================================================================

export class ClipboardWatcher extends EventEmitter {
  readonly intervalMs: number;
  private readonly clipboard: ClipboardPort;
  private readonly registry: DetectorRegistry;
  private readonly placeholders: PlaceholderMode;
  private readonly sleep: Sleep;

  constructor(options: ClipboardWatcherOptions) {
    super();
    const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    if (!Number.isFinite(intervalMs) || intervalMs < MIN_INTERVAL_MS) {
      throw new RangeError(`Watch interval must be at least ${MIN_INTERVAL_MS}ms (got ${intervalMs})`);
    }
    this.intervalMs = intervalMs;
    this.clipboard = options.clipboard;
    this.registry = options.registry ?? new DetectorRegistry();
    this.placeholders = options.placeholders ?? 'ephemeral';
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Poll until `signal` aborts. Cancellation takes effect between polls.
   */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      await this.poll();
      if (signal?.aborted) break;

      try {
        await this.sleep(this.intervalMs, signal);
      } catch (error) {
        if (signal?.aborted) break;
        throw error;
      }
    }
  }

  /**
   * One iteration: read, sanitize, re-read and write back if unchanged.
   *
   * Read and write failures end the iteration and surface as `error`.
   */
  async poll(): Promise<PollResult> {
    let original: string;
    try {
      original = await this.clipboard.read();
    } catch (error) {
      this.fail(error);
      return 'error';
    }

    const result = this.sanitize(original);
    if (result.text === original) {
      return 'clean';
    }

    try {
      const current = await this.clipboard.read();
      if (current !== original) {
        const stale: StaleWrite = { discarded: result.text };
        this.emit('stale', stale);
        return 'stale';
      }
      await this.clipboard.write(result.text);
    } catch (error) {
      this.fail(error);
      return 'error';
    }

    this.emit('sanitized', result);
    return 'sanitized';
  }

  private sanitize(text: string): RedactionResult {
    const allocator: PlaceholderAllocator = createPlaceholderAllocator(this.placeholders);
    return redact(text, this.registry.scan(text), allocator);
  }

  private fail(error: unknown): void {
    // Without an 'error' listener this rethrows and ends run().
    this.emit('error', error);
  }
}
