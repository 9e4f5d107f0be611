import { generateKey, KEY_SIZE } from './crypto.js';
import { CorruptKeyError, NotFoundError, NotInitializedError } from './errors.js';
import type { SecretStore } from './store.js';

// -- Types ---

export type InitializeResult = 'created' | 'already_initialized';

// -- Constants ---

/** Reserved config name holding the hex-encoded store key. */
export const ENCRYPTION_KEY_CONFIG = 'encryption_key';

const HEX_KEY_PATTERN = new RegExp(`^[0-9a-fA-F]{${KEY_SIZE * 2}}$`);

// -- Public API ---

/**
 * Create the store key if none exists. Never replaces an existing key.
 */
export async function initialize(store: SecretStore): Promise<InitializeResult> {
  if (await hasKey(store)) {
    return 'already_initialized';
  }

  const key = generateKey();
  await store.setConfig(ENCRYPTION_KEY_CONFIG, Buffer.from(key.toString('hex'), 'utf-8'));
  return 'created';
}

/**
 * Read and decode the store key.
 *
 * @throws NotInitializedError if `initialize` has never run on this store
 * @throws CorruptKeyError if the persisted value is not 64 hex characters
 */
export async function getKey(store: SecretStore): Promise<Buffer> {
  let raw: Buffer;
  try {
    raw = await store.getConfig(ENCRYPTION_KEY_CONFIG);
  } catch (error: unknown) {
    if (error instanceof NotFoundError) {
      throw new NotInitializedError();
    }
    throw error;
  }

  const hex = raw.toString('utf-8');
  if (!HEX_KEY_PATTERN.test(hex)) {
    throw new CorruptKeyError(
      `failed to decode encryption key: expected ${KEY_SIZE * 2} hex characters, got ${hex.length} characters`,
    );
  }

  return Buffer.from(hex, 'hex');
}

// -- Internal Helpers ---

async function hasKey(store: SecretStore): Promise<boolean> {
  try {
    await store.getConfig(ENCRYPTION_KEY_CONFIG);
    return true;
  } catch (error: unknown) {
    if (error instanceof NotFoundError) {
      return false;
    }
    throw error;
  }
}
