import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import {
  acquireLock,
  ensureDir,
  readJsonFile,
  resolveStorePath,
  writeJsonFileDurable,
} from './storage.js';
import { LockboxError, NotFoundError, StorageError, errorMessage } from './errors.js';

// -- Types ---

/**
 * Metadata of one stored secret (never includes the value).
 */
export interface SecretEntry {
  readonly key: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * Persistent mapping of secret name to encrypted blob, plus a separate
 * config mapping for store metadata such as the encryption key.
 *
 * Values are opaque bytes here; encryption happens a layer above.
 */
export interface SecretStore {
  /** Insert or fully replace a secret. */
  upsert(key: string, encryptedValue: Uint8Array): Promise<void>;
  /** @throws NotFoundError if absent */
  get(key: string): Promise<Buffer>;
  /** @throws NotFoundError if nothing was deleted */
  delete(key: string): Promise<void>;
  /** All secret keys, ascending. */
  list(): Promise<string[]>;
  /** Secret metadata, ascending by key. */
  entries(): Promise<SecretEntry[]>;
  /** @throws NotFoundError if absent */
  getConfig(name: string): Promise<Buffer>;
  setConfig(name: string, value: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

// -- Document Schema ---

const secretRecordSchema = z.object({
  value: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

/**
 * A JSON object map validated as its own entries. `z.record` rebuilds the
 * object by assignment, which turns a `__proto__` key into a prototype.
 */
function entriesSchema<T extends z.ZodTypeAny>(valueSchema: T) {
  return z.preprocess(
    (input) => (isPlainObject(input) ? Object.entries(input) : input),
    z.array(z.tuple([z.string(), valueSchema]), {
      invalid_type_error: 'Expected object',
    }),
  );
}

const storeDocumentSchema = z.object({
  version: z.literal(1),
  config: entriesSchema(z.string()),
  secrets: entriesSchema(secretRecordSchema),
});

type SecretRecord = z.infer<typeof secretRecordSchema>;
type ParsedDocument = z.infer<typeof storeDocumentSchema>;

/** On-disk shape; `Object.fromEntries` keeps every key as an own property. */
interface StoreDocument {
  readonly version: 1;
  readonly config: Record<string, string>;
  readonly secrets: Record<string, SecretRecord>;
}

interface StoreState {
  readonly config: Map<string, string>;
  readonly secrets: Map<string, SecretRecord>;
}

// -- File-backed Store ---

/**
 * Secret store persisted as a single JSON document.
 *
 * Every read reloads the file, so a long-running reader sees writes made
 * by other processes. Every write holds the store lock and is fsynced
 * before it returns.
 */
export class FileSecretStore implements SecretStore {
  private closed = false;

  private constructor(readonly filePath: string) {}

  /**
   * Open (and create if missing) the store at `filePath`.
   * Defaults to `$LOCKBOX_DB_PATH` or `~/.lockbox/lockbox.json`.
   */
  static async open(filePath: string = resolveStorePath()): Promise<FileSecretStore> {
    try {
      ensureDir(path.dirname(filePath));
      if (!fs.existsSync(filePath)) {
        const release = await acquireLock(filePath);
        try {
          if (!fs.existsSync(filePath)) {
            writeJsonFileDurable(filePath, toDocument(emptyState()));
          }
        } finally {
          release();
        }
      }
    } catch (error: unknown) {
      throw new StorageError(`failed to open store: ${errorMessage(error)}`, error);
    }

    const store = new FileSecretStore(filePath);
    // Surface a corrupt document at open time rather than on first use
    store.load();
    return store;
  }

  async upsert(key: string, encryptedValue: Uint8Array): Promise<void> {
    await this.mutate((state) => {
      putSecret(state, key, encryptedValue);
    });
  }

  async get(key: string): Promise<Buffer> {
    const record = this.load().secrets.get(key);
    if (!record) {
      throw new NotFoundError(key);
    }
    return Buffer.from(record.value, 'base64');
  }

  async delete(key: string): Promise<void> {
    await this.mutate((state) => {
      if (!state.secrets.delete(key)) {
        throw new NotFoundError(key);
      }
    });
  }

  async list(): Promise<string[]> {
    return sortedKeys(this.load().secrets);
  }

  async entries(): Promise<SecretEntry[]> {
    return toEntries(this.load().secrets);
  }

  async getConfig(name: string): Promise<Buffer> {
    const value = this.load().config.get(name);
    if (value === undefined) {
      throw new NotFoundError(name, `config '${name}' not found`);
    }
    return Buffer.from(value, 'base64');
  }

  async setConfig(name: string, value: Uint8Array): Promise<void> {
    await this.mutate((state) => {
      state.config.set(name, Buffer.from(value).toString('base64'));
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // -- Internal ---

  private load(): StoreState {
    this.assertOpen();

    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (error: unknown) {
      throw new StorageError(`failed to read store ${this.filePath}: ${errorMessage(error)}`, error);
    }

    if (raw === null) {
      return emptyState();
    }

    const parsed = storeDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(
        `invalid store document ${this.filePath}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`,
        parsed.error,
      );
    }

    return fromDocument(parsed.data);
  }

  private async mutate(apply: (state: StoreState) => void): Promise<void> {
    this.assertOpen();

    let release: () => void;
    try {
      release = await acquireLock(this.filePath);
    } catch (error: unknown) {
      throw new StorageError(errorMessage(error), error);
    }

    try {
      const state = this.load();
      apply(state);
      writeJsonFileDurable(this.filePath, toDocument(state));
    } catch (error: unknown) {
      if (error instanceof LockboxError) {
        throw error;
      }
      throw new StorageError(`failed to write store ${this.filePath}: ${errorMessage(error)}`, error);
    } finally {
      release();
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError('store is closed');
    }
  }
}

// -- In-memory Store ---

/**
 * Non-persistent store with the same semantics as {@link FileSecretStore}.
 * Used for injecting into the server and in tests.
 */
export class MemorySecretStore implements SecretStore {
  private readonly state: StoreState = emptyState();
  private closed = false;

  async upsert(key: string, encryptedValue: Uint8Array): Promise<void> {
    this.assertOpen();
    putSecret(this.state, key, encryptedValue);
  }

  async get(key: string): Promise<Buffer> {
    this.assertOpen();
    const record = this.state.secrets.get(key);
    if (!record) {
      throw new NotFoundError(key);
    }
    return Buffer.from(record.value, 'base64');
  }

  async delete(key: string): Promise<void> {
    this.assertOpen();
    if (!this.state.secrets.delete(key)) {
      throw new NotFoundError(key);
    }
  }

  async list(): Promise<string[]> {
    this.assertOpen();
    return sortedKeys(this.state.secrets);
  }

  async entries(): Promise<SecretEntry[]> {
    this.assertOpen();
    return toEntries(this.state.secrets);
  }

  async getConfig(name: string): Promise<Buffer> {
    this.assertOpen();
    const value = this.state.config.get(name);
    if (value === undefined) {
      throw new NotFoundError(name, `config '${name}' not found`);
    }
    return Buffer.from(value, 'base64');
  }

  async setConfig(name: string, value: Uint8Array): Promise<void> {
    this.assertOpen();
    this.state.config.set(name, Buffer.from(value).toString('base64'));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError('store is closed');
    }
  }
}

// -- Internal Helpers ---

function emptyState(): StoreState {
  return { config: new Map(), secrets: new Map() };
}

function fromDocument(doc: ParsedDocument): StoreState {
  return {
    config: new Map(doc.config),
    secrets: new Map(doc.secrets),
  };
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toDocument(state: StoreState): StoreDocument {
  return {
    version: 1,
    config: Object.fromEntries(state.config),
    secrets: Object.fromEntries(state.secrets),
  };
}

function putSecret(state: StoreState, key: string, encryptedValue: Uint8Array): void {
  const now = new Date().toISOString();
  const existing = state.secrets.get(key);
  state.secrets.set(key, {
    value: Buffer.from(encryptedValue).toString('base64'),
    createdAt: existing?.createdAt ?? now,
    updatedAt: now,
  });
}

function sortedKeys(secrets: Map<string, SecretRecord>): string[] {
  return [...secrets.keys()].sort();
}

function toEntries(secrets: Map<string, SecretRecord>): SecretEntry[] {
  return sortedKeys(secrets).flatMap((key) => {
    const record = secrets.get(key);
    return record ? [{ key, createdAt: record.createdAt, updatedAt: record.updatedAt }] : [];
  });
}
