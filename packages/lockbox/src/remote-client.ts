/**
 * Client for the read-only lockbox HTTP protocol.
 *
 * Reproduces what local mode reads from the store: the key list, single
 * values, the full key/value mapping, or the ready-made export stream.
 * Any non-success status is a hard failure; nothing is retried.
 */

import { z } from 'zod';
import { NotFoundError, RemoteError, errorMessage } from './errors.js';

// -- Types ---

export interface RemoteEndpoint {
  /** Canonical `HOST:PORT` form. */
  readonly address: string;
  readonly baseUrl: string;
}

// -- Constants ---

export const REMOTE_ENV = 'LOCKBOX_REMOTE';

const keyListSchema = z.array(z.string());

// -- Public API ---

/**
 * Parse a `--remote` value.
 *
 * The canonical form is `HOST:PORT`. An `http://HOST:PORT` URL (with an
 * optional trailing slash) is normalized to it; anything else is rejected.
 */
export function parseRemote(value: string): RemoteEndpoint {
  const input = value.trim();
  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(input);

  let parsed: URL;
  try {
    parsed = new URL(hasScheme ? input : `http://${input}`);
  } catch {
    throw invalidRemote(value, 'expected HOST:PORT');
  }

  if (parsed.protocol !== 'http:') {
    throw invalidRemote(value, `unsupported scheme "${parsed.protocol.slice(0, -1)}" (only http is served)`);
  }
  if (parsed.username || parsed.password) {
    throw invalidRemote(value, 'credentials are not supported');
  }
  if (parsed.pathname !== '/' || parsed.search || parsed.hash) {
    throw invalidRemote(value, 'expected HOST:PORT with no path');
  }
  if (!parsed.hostname) {
    throw invalidRemote(value, 'missing host');
  }
  // URL drops an explicit default port, so demand it in the raw input too
  const port = parsed.port || (/:80\/?$/.test(input) ? '80' : '');
  if (!port || port === '0') {
    throw invalidRemote(value, 'missing or invalid port');
  }

  const address = `${parsed.hostname}:${port}`;
  return { address, baseUrl: `http://${address}` };
}

/**
 * GET /secrets: all keys, ascending.
 */
export async function fetchKeys(endpoint: RemoteEndpoint): Promise<string[]> {
  const response = await request(endpoint, '/secrets');
  await assertOk(response);

  let data: unknown;
  try {
    data = await response.json();
  } catch (error: unknown) {
    throw new RemoteError(`failed to decode remote response: ${errorMessage(error)}`, response.status, error);
  }

  const keys = keyListSchema.safeParse(data);
  if (!keys.success) {
    throw new RemoteError('failed to decode remote response: expected a JSON array of strings', response.status);
  }
  return keys.data;
}

/**
 * GET /secrets/:key: one decrypted value.
 *
 * @throws NotFoundError if the server has no such key
 */
export async function fetchSecret(endpoint: RemoteEndpoint, name: string): Promise<string> {
  // encodeURIComponent keeps dots, and URL resolution collapses dot segments
  if (name === '.' || name === '..') {
    throw new RemoteError(`secret name '${name}' cannot be addressed over HTTP`);
  }
  const response = await request(endpoint, `/secrets/${encodeURIComponent(name)}`);
  if (response.status === 404) {
    throw new NotFoundError(name);
  }
  await assertOk(response, name);
  return readText(response);
}

/**
 * Fetch the key list, then each value in turn.
 */
export async function fetchSecrets(endpoint: RemoteEndpoint): Promise<Record<string, string>> {
  const keys = await fetchKeys(endpoint);
  const entries: [string, string][] = [];
  for (const key of keys) {
    entries.push([key, await fetchSecret(endpoint, key)]);
  }
  return Object.fromEntries(entries);
}

/**
 * GET /env: the formatted export stream in one round trip.
 */
export async function fetchExport(endpoint: RemoteEndpoint): Promise<string> {
  const response = await request(endpoint, '/env');
  await assertOk(response);
  return readText(response);
}

// -- Internal Helpers ---

async function request(endpoint: RemoteEndpoint, path: string): Promise<Response> {
  try {
    return await fetch(`${endpoint.baseUrl}${path}`);
  } catch (error: unknown) {
    throw new RemoteError(
      `failed to fetch ${path} from ${endpoint.address}: ${errorMessage(error)}`,
      undefined,
      error,
    );
  }
}

async function assertOk(response: Response, name?: string): Promise<void> {
  if (response.ok) {
    return;
  }
  const body = await readText(response);
  const subject = name === undefined ? '' : ` for '${name}'`;
  throw new RemoteError(
    `remote server returned status ${response.status}${subject}: ${body}`,
    response.status,
  );
}

async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error: unknown) {
    throw new RemoteError(`failed to read remote response: ${errorMessage(error)}`, response.status, error);
  }
}

function invalidRemote(value: string, reason: string): RemoteError {
  return new RemoteError(`invalid remote "${value}": ${reason}`);
}
