import { LockboxError, errorMessage } from './errors.js';
import type { LockboxErrorCode } from './errors.js';

export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data));
}

/**
 * Write raw data to stdout with no added newline.
 */
export function outputRaw(data: string): void {
  process.stdout.write(data);
}

/**
 * Report a failure on stderr as one line and exit with the mapped code.
 */
export function outputError(error: unknown): void {
  process.stderr.write(`[lockbox] Error: ${oneLine(errorMessage(error))}\n`);
  process.exit(getExitCode(error));
}

/**
 * Map error kinds to exit codes: 3 for key and integrity problems, 1 otherwise.
 */
export function getExitCode(error: unknown): number {
  const code: LockboxErrorCode | undefined = error instanceof LockboxError ? error.code : undefined;
  switch (code) {
    case 'not_initialized':
    case 'invalid_key_size':
    case 'authentication_failed':
    case 'corrupt_key':
      return 3;
    default:
      return 1;
  }
}

// -- Internal Helpers ---

function oneLine(message: string): string {
  return message.replace(/\s*\n\s*/g, ' ').trim();
}
