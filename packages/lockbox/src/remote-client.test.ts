import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import {
  fetchExport,
  fetchKeys,
  fetchSecret,
  fetchSecrets,
  parseRemote,
} from './remote-client.js';
import type { RemoteEndpoint } from './remote-client.js';
import { createServer } from './server/index.js';
import { MemorySecretStore } from './store.js';
import { generateKey } from './crypto.js';
import { putSecret } from './secrets.js';
import { NotFoundError, RemoteError } from './errors.js';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

describe('parseRemote', () => {
  it('should accept HOST:PORT', () => {
    expect(parseRemote('localhost:8100')).toEqual({
      address: 'localhost:8100',
      baseUrl: 'http://localhost:8100',
    });
  });

  it('should normalize an http URL to HOST:PORT', () => {
    expect(parseRemote('http://127.0.0.1:8100/').address).toBe('127.0.0.1:8100');
    expect(parseRemote('http://127.0.0.1:8100').address).toBe('127.0.0.1:8100');
  });

  it('should keep an explicit port 80', () => {
    expect(parseRemote('localhost:80').address).toBe('localhost:80');
  });

  it('should accept a bracketed IPv6 host', () => {
    expect(parseRemote('[::1]:8100').baseUrl).toBe('http://[::1]:8100');
  });

  it('should reject a missing port', () => {
    expect(() => parseRemote('localhost')).toThrow(
      'invalid remote "localhost": missing or invalid port',
    );
  });

  it('should reject port 0', () => {
    expect(() => parseRemote('localhost:0')).toThrow(RemoteError);
  });

  it('should reject a non-numeric port', () => {
    expect(() => parseRemote('localhost:abc')).toThrow(
      'invalid remote "localhost:abc": expected HOST:PORT',
    );
  });

  it('should reject other schemes', () => {
    expect(() => parseRemote('https://localhost:8100')).toThrow(
      'invalid remote "https://localhost:8100": unsupported scheme "https" (only http is served)',
    );
  });

  it('should reject a path', () => {
    expect(() => parseRemote('http://localhost:8100/secrets')).toThrow(
      'expected HOST:PORT with no path',
    );
  });

  it('should reject credentials', () => {
    expect(() => parseRemote('user:pw@localhost:8100')).toThrow('credentials are not supported');
  });
});

describe('remote client against a live server', () => {
  let store: MemorySecretStore;
  let key: Buffer;
  let server: Server | null = null;

  async function start(serverKey: Uint8Array = key): Promise<RemoteEndpoint> {
    const instance = await createServer({
      port: 0,
      host: '127.0.0.1',
      context: { store, key: serverKey },
    });
    server = instance.httpServer;
    return parseRemote(`127.0.0.1:${instance.port}`);
  }

  beforeEach(() => {
    store = new MemorySecretStore();
    key = generateKey();
  });

  afterEach(async () => {
    if (server) {
      await closeServer(server);
      server = null;
    }
  });

  it('should fetch the key list', async () => {
    await putSecret(store, key, 'B', '2');
    await putSecret(store, key, 'A', '1');
    const endpoint = await start();

    expect(await fetchKeys(endpoint)).toEqual(['A', 'B']);
  });

  it('should fetch a single value', async () => {
    await putSecret(store, key, 'API_KEY', 'secret123');
    const endpoint = await start();

    expect(await fetchSecret(endpoint, 'API_KEY')).toBe('secret123');
  });

  it('should encode names that need escaping in a path', async () => {
    await putSecret(store, key, 'a/b c', 'odd');
    const endpoint = await start();

    expect(await fetchSecret(endpoint, 'a/b c')).toBe('odd');
  });

  it('should map 404 to NotFoundError', async () => {
    const endpoint = await start();

    const error = await fetchSecret(endpoint, 'MISSING').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toHaveProperty('message', "secret 'MISSING' not found");
  });

  it('should fetch all secrets as a mapping', async () => {
    await putSecret(store, key, 'DB_HOST', 'localhost');
    await putSecret(store, key, 'DB_PORT', '5432');
    const endpoint = await start();

    expect(await fetchSecrets(endpoint)).toEqual({ DB_HOST: 'localhost', DB_PORT: '5432' });
  });

  it('should fetch the export stream', async () => {
    await putSecret(store, key, 'DB_HOST', 'localhost');
    const endpoint = await start();

    expect(await fetchExport(endpoint)).toBe('export DB_HOST="localhost"\n');
  });

  it('should report other failures with status and body', async () => {
    await putSecret(store, key, 'API_KEY', 'secret123');
    const endpoint = await start(generateKey());

    const error = await fetchSecret(endpoint, 'API_KEY').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toHaveProperty('status', 500);
    expect(error).toHaveProperty(
      'message',
      "remote server returned status 500 for 'API_KEY': Error: decryption failed: invalid authentication tag or wrong key",
    );
  });

  it('should fail fetchSecrets when any single fetch fails', async () => {
    await putSecret(store, key, 'A', '1');
    await store.upsert('B', Buffer.alloc(40));
    const endpoint = await start();

    await expect(fetchSecrets(endpoint)).rejects.toBeInstanceOf(RemoteError);
  });

  it('should report an unreachable server as RemoteError', async () => {
    const endpoint = await start();
    if (server) {
      await closeServer(server);
      server = null;
    }

    await expect(fetchKeys(endpoint)).rejects.toThrow(
      `failed to fetch /secrets from ${endpoint.address}:`,
    );
  });
});

describe('remote client response decoding', () => {
  const endpoint = parseRemote('127.0.0.1:8100');

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should reject a key list that is not an array of strings', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('{"keys":[]}', { status: 200 })));

    await expect(fetchKeys(endpoint)).rejects.toThrow(
      'failed to decode remote response: expected a JSON array of strings',
    );
  });

  it('should reject a key list that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('not json', { status: 200 })));

    await expect(fetchKeys(endpoint)).rejects.toThrow(/^failed to decode remote response: /);
  });

  it.each(['.', '..'])('should refuse the dot-segment name %j without a request', async (name) => {
    const fetchMock = vi.fn(async () => new Response('value', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchSecret(endpoint, name)).rejects.toThrow(
      `secret name '${name}' cannot be addressed over HTTP`,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should request the expected URL', async () => {
    const fetchMock = vi.fn(async () => new Response('value', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await fetchSecret(endpoint, 'API_KEY');

    expect(fetchMock).toHaveBeenCalledWith('http://127.0.0.1:8100/secrets/API_KEY');
  });
});
