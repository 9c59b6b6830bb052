/**
 * clipscrub-cli - Command-line interface for clipscrub
 *
 * - clipscrub [sanitize]: sanitize the clipboard, stdin or a file
 * - clipscrub watch: keep the clipboard sanitized (experimental)
 * - clipscrub device-id: print the device id for license binding
 * - clipscrub license: show license status
 */

export { VERSION } from './version.js';

export { createProgram } from './program.js';
export { main, reportFailure } from './main.js';
export { createCliContext } from './context.js';
export type { CliContext, CliContextOptions } from './context.js';
export { CliError, ClipboardError, EXIT_READ, EXIT_USAGE, EXIT_WRITE, exitCodeFor } from './errors.js';

// Clipboard
export { SystemClipboard, detectSystemClipboard } from './clipboard/system-clipboard.js';
export { BACKENDS, pickBackend } from './clipboard/backends.js';
export type { BackendName, ClipboardBackend } from './clipboard/backends.js';

// Reporters
export * from './reporters/index.js';

// Command exports (for programmatic use)
export * from './commands/index.js';
