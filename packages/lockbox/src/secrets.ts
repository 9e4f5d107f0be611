import { decrypt, encrypt } from './crypto.js';
import { formatExportLine } from './env-format.js';
import type { SecretStore } from './store.js';

/**
 * Decrypt-on-read / encrypt-on-write helpers over a store and its key.
 * Shared by the local commands and the server.
 */

export async function putSecret(
  store: SecretStore,
  key: Uint8Array,
  name: string,
  value: string,
): Promise<void> {
  await store.upsert(name, encrypt(Buffer.from(value, 'utf-8'), key));
}

export async function readSecret(
  store: SecretStore,
  key: Uint8Array,
  name: string,
): Promise<string> {
  const blob = await store.get(name);
  return decrypt(blob, key).toString('utf-8');
}

/**
 * Yield every secret in ascending key order, decrypting one at a time.
 * A failure stops the iteration; entries already yielded stay yielded.
 */
export async function* decryptAll(
  store: SecretStore,
  key: Uint8Array,
): AsyncGenerator<[name: string, value: string]> {
  const names = await store.list();
  for (const name of names) {
    yield [name, await readSecret(store, key, name)];
  }
}

export async function readAllSecrets(
  store: SecretStore,
  key: Uint8Array,
): Promise<Record<string, string>> {
  const entries: [string, string][] = [];
  for await (const entry of decryptAll(store, key)) {
    entries.push(entry);
  }
  return Object.fromEntries(entries);
}

/**
 * Yield `export KEY="value"` lines in ascending key order.
 */
export async function* exportLines(
  store: SecretStore,
  key: Uint8Array,
): AsyncGenerator<string> {
  for await (const [name, value] of decryptAll(store, key)) {
    yield formatExportLine(name, value);
  }
}
