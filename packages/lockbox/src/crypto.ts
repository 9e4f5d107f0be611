import * as crypto from 'node:crypto';
import {
  AuthenticationError,
  InvalidKeySizeError,
  MalformedCiphertextError,
} from './errors.js';

// -- Constants ---

export const KEY_SIZE = 32; // bytes (AES-256)
export const NONCE_SIZE = 12; // bytes (AES-GCM nonce)
export const TAG_SIZE = 16; // bytes (AES-GCM auth tag)

const ALGORITHM = 'aes-256-gcm';

// -- Public API ---

/**
 * Generate a random 32-byte key for AES-256-GCM.
 */
export function generateKey(): Buffer {
  return crypto.randomBytes(KEY_SIZE);
}

/**
 * Encrypt plaintext with AES-256-GCM.
 *
 * Output layout: `nonce(12) || ciphertext || tag(16)`. A fresh nonce is
 * drawn for every call.
 */
export function encrypt(plaintext: Uint8Array, key: Uint8Array): Buffer {
  assertKeySize(key);

  const nonce = crypto.randomBytes(NONCE_SIZE);
  const cipher = crypto.createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_SIZE });
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
}

/**
 * Decrypt a blob produced by {@link encrypt}.
 *
 * @throws MalformedCiphertextError if the blob is shorter than a nonce
 * @throws AuthenticationError on a tampered blob or a wrong key
 */
export function decrypt(blob: Uint8Array, key: Uint8Array): Buffer {
  assertKeySize(key);

  if (blob.length < NONCE_SIZE) {
    throw new MalformedCiphertextError(NONCE_SIZE, blob.length);
  }

  // A blob with no room for a tag cannot verify; report it like any other bad tag.
  if (blob.length < NONCE_SIZE + TAG_SIZE) {
    throw new AuthenticationError();
  }

  const data = Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength);
  const nonce = data.subarray(0, NONCE_SIZE);
  const ciphertext = data.subarray(NONCE_SIZE, data.length - TAG_SIZE);
  const tag = data.subarray(data.length - TAG_SIZE);

  try {
    const decipher = crypto.createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_SIZE });
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new AuthenticationError();
  }
}

// -- Internal Helpers ---

function assertKeySize(key: Uint8Array): void {
  if (key.length !== KEY_SIZE) {
    throw new InvalidKeySizeError(KEY_SIZE, key.length);
  }
}
