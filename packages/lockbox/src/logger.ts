/**
 * Stderr logger for human-readable status messages.
 *
 * All messages go to stderr so stdout carries only data: secret values,
 * key lists and export lines that callers pipe into `eval`.
 */

export const DEBUG_ENV = 'LOCKBOX_DEBUG';

/**
 * Write a prefixed log message to stderr.
 *
 * @param message - Human-readable message (no newline needed)
 */
export function log(message: string): void {
  process.stderr.write(`[lockbox] ${message}\n`);
}

/**
 * Like {@link log}, but only when `LOCKBOX_DEBUG` is set to a non-empty value other than `0`.
 */
export function debug(message: string): void {
  if (isDebugEnabled()) {
    log(`debug: ${message}`);
  }
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[DEBUG_ENV];
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}
