import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { Server } from 'node:http';
import { NotFoundError, errorMessage } from '../errors.js';
import { debug } from '../logger.js';
import { exportLines, readSecret } from '../secrets.js';
import { DEFAULT_HOST } from './config.js';
import type { ServerContext } from './types.js';

export interface CreateServerOptions {
  readonly port: number;
  readonly host?: string;
  readonly context: ServerContext;
}

export interface ServerInstance {
  readonly httpServer: Server;
  readonly port: number;
  readonly url: string;
}

/**
 * Read-only HTTP access to a store.
 *
 * Values are decrypted server-side and sent as plaintext with no
 * authentication, so the server must only listen on loopback. Callers that
 * cross a network boundary are expected to tunnel.
 */
export async function createServer(
  options: CreateServerOptions,
): Promise<ServerInstance> {
  const host = options.host ?? DEFAULT_HOST;
  const { store, key } = options.context;
  const app = express();

  // `/secrets` and `/secrets/` must route differently
  app.set('strict routing', true);
  app.disable('x-powered-by');

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.on('finish', () => {
      debug(`${req.method} ${req.path} ${res.statusCode}`);
    });
    next();
  });

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/secrets', async (_req, res, next) => {
    try {
      res.json(await store.list());
    } catch (error: unknown) {
      next(error);
    }
  });

  app.get('/secrets/', (_req, res) => {
    sendText(res, 400, 'Error: no key specified');
  });

  app.get('/secrets/:key', async (req, res, next) => {
    const name = req.params['key'] ?? '';
    try {
      const value = await readSecret(store, key, name);
      sendText(res, 200, value);
    } catch (error: unknown) {
      next(error);
    }
  });

  // Assembled in full before responding so a failure is a clean 500
  app.get('/env', async (_req, res, next) => {
    try {
      let body = '';
      for await (const line of exportLines(store, key)) {
        body += line;
      }
      sendText(res, 200, body);
    } catch (error: unknown) {
      next(error);
    }
  });

  app.use((_req: Request, res: Response) => {
    sendText(res, 404, 'Error: not found');
  });

  // Express recognizes error handlers by arity, so `_next` must stay
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof NotFoundError) {
      sendText(res, 404, `Error: ${error.message}`);
      return;
    }
    // Express tags its own request errors, e.g. a param that fails to decode
    const status = clientErrorStatus(error);
    sendText(res, status ?? 500, `Error: ${errorMessage(error)}`);
  });

  // Start listening
  const httpServer = await new Promise<Server>((resolve, reject) => {
    const srv = app.listen(options.port, host, () => resolve(srv));
    srv.once('error', reject);
  });

  const addr = httpServer.address();
  const actualPort =
    typeof addr === 'object' && addr ? addr.port : options.port;
  const displayHost = host.includes(':') ? `[${host}]` : host;
  const url = `http://${displayHost}:${actualPort}`;

  return { httpServer, port: actualPort, url };
}

// -- Internal Helpers ---

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function sendText(res: Response, status: number, body: string): void {
  res.status(status).type('text/plain').send(body);
}
