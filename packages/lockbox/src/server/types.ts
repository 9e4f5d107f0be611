import type { SecretStore } from '../store.js';

/**
 * Everything a request handler needs: the opened store and its key.
 * Built once at startup and shared read-only by all requests.
 */
export interface ServerContext {
  readonly store: SecretStore;
  readonly key: Uint8Array;
}

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
}
