// -- Types ---

export type LockboxErrorCode =
  | 'not_initialized'
  | 'not_found'
  | 'invalid_key_size'
  | 'malformed_ciphertext'
  | 'authentication_failed'
  | 'corrupt_key'
  | 'storage_error'
  | 'remote_error'
  | 'subprocess_error'
  | 'config_error';

// -- Error Types ---

/**
 * Base class for every failure raised by lockbox.
 * Callers branch on the subclass (or `code`), never on the message.
 */
export class LockboxError extends Error {
  constructor(
    readonly code: LockboxErrorCode,
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

/**
 * Thrown when the store has no encryption key yet.
 */
export class NotInitializedError extends LockboxError {
  override readonly name = 'NotInitializedError' as const;

  constructor(message = "encryption key not found. Please run 'lb init' first") {
    super('not_initialized', message);
  }
}

/**
 * Thrown when a secret or config entry does not exist.
 */
export class NotFoundError extends LockboxError {
  override readonly name = 'NotFoundError' as const;

  constructor(
    readonly key: string,
    message = `secret '${key}' not found`,
  ) {
    super('not_found', message);
  }
}

export class InvalidKeySizeError extends LockboxError {
  override readonly name = 'InvalidKeySizeError' as const;

  constructor(expected: number, actual: number) {
    super('invalid_key_size', `invalid key size: expected ${expected} bytes, got ${actual}`);
  }
}

export class MalformedCiphertextError extends LockboxError {
  override readonly name = 'MalformedCiphertextError' as const;

  constructor(minimum: number, actual: number) {
    super(
      'malformed_ciphertext',
      `ciphertext too short: expected at least ${minimum} bytes, got ${actual}`,
    );
  }
}

/**
 * Thrown when the AEAD tag does not verify. Tampered data and a wrong key
 * are reported identically.
 */
export class AuthenticationError extends LockboxError {
  override readonly name = 'AuthenticationError' as const;

  constructor(message = 'decryption failed: invalid authentication tag or wrong key') {
    super('authentication_failed', message);
  }
}

export class CorruptKeyError extends LockboxError {
  override readonly name = 'CorruptKeyError' as const;

  constructor(message: string) {
    super('corrupt_key', message);
  }
}

export class StorageError extends LockboxError {
  override readonly name = 'StorageError' as const;

  constructor(message: string, cause?: unknown) {
    super('storage_error', message, cause);
  }
}

/**
 * Non-success status or transport failure while talking to a lockbox server.
 */
export class RemoteError extends LockboxError {
  override readonly name = 'RemoteError' as const;

  constructor(
    message: string,
    readonly status?: number,
    cause?: unknown,
  ) {
    super('remote_error', message, cause);
  }
}

/**
 * The child process of `lb run` could not be started.
 */
export class SubprocessError extends LockboxError {
  override readonly name = 'SubprocessError' as const;

  constructor(message: string, cause?: unknown) {
    super('subprocess_error', message, cause);
  }
}

export class ConfigError extends LockboxError {
  override readonly name = 'ConfigError' as const;

  constructor(message: string) {
    super('config_error', message);
  }
}

// -- Helpers ---

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
