// -- Errors ---

export type { LockboxErrorCode } from './errors.js';
export {
  LockboxError,
  NotInitializedError,
  NotFoundError,
  InvalidKeySizeError,
  MalformedCiphertextError,
  AuthenticationError,
  CorruptKeyError,
  StorageError,
  RemoteError,
  SubprocessError,
  ConfigError,
} from './errors.js';

// -- Crypto ---

export { generateKey, encrypt, decrypt, KEY_SIZE, NONCE_SIZE, TAG_SIZE } from './crypto.js';

// -- Store + Key ---

export type { SecretStore, SecretEntry } from './store.js';
export { FileSecretStore, MemorySecretStore } from './store.js';
export { resolveStorePath } from './storage.js';
export type { InitializeResult } from './key-manager.js';
export { initialize, getKey, ENCRYPTION_KEY_CONFIG } from './key-manager.js';
export { putSecret, readSecret, readAllSecrets, decryptAll, exportLines } from './secrets.js';

// -- Export Format ---

export { escapeShellValue, formatExportLine } from './env-format.js';

// -- Remote Protocol ---

export type { ServerContext, ServerConfig } from './server/types.js';
export type { CreateServerOptions, ServerInstance } from './server/index.js';
export { createServer } from './server/index.js';
export { resolveServerConfig } from './server/config.js';
export type { RemoteEndpoint } from './remote-client.js';
export { parseRemote, fetchKeys, fetchSecret, fetchSecrets, fetchExport } from './remote-client.js';

// -- Run ---

export type { RunOptions } from './runner.js';
export { buildChildEnv, runWithSecrets } from './runner.js';
