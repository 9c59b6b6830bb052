/**
 * CLI errors and process exit codes
 */

export const EXIT_USAGE = 1;
export const EXIT_READ = 2;
export const EXIT_WRITE = 3;

/**
 * Failure of a single CLI operation with the exit code it maps to
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_USAGE) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

export type ClipboardOperation = 'read' | 'write';

/**
 * A clipboard backend is missing or one of its commands failed
 */
export class ClipboardError extends CliError {
  readonly operation: ClipboardOperation;

  constructor(operation: ClipboardOperation, message: string) {
    super(message, operation === 'read' ? EXIT_READ : EXIT_WRITE);
    this.name = 'ClipboardError';
    this.operation = operation;
  }
}

/**
 * Exit code for an error that ended a command. Config, licensing and any
 * unexpected failure map to {@link EXIT_USAGE}.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof CliError ? error.exitCode : EXIT_USAGE;
}
