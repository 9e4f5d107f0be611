import { Command, InvalidArgumentError } from 'commander';
import { ConfigError } from './errors.js';
import { FileSecretStore } from './store.js';
import type { SecretStore } from './store.js';
import { getKey, initialize } from './key-manager.js';
import { exportLines, putSecret, readAllSecrets, readSecret } from './secrets.js';
import {
  REMOTE_ENV,
  fetchExport,
  fetchKeys,
  fetchSecret,
  fetchSecrets,
  parseRemote,
} from './remote-client.js';
import type { RemoteEndpoint } from './remote-client.js';
import { runWithSecrets } from './runner.js';
import { promptForSecret } from './secret-prompt.js';
import { log } from './logger.js';
import { outputError, outputJson, outputRaw } from './output.js';

// -- Internal Helpers ---

async function withStore<T>(fn: (store: SecretStore) => Promise<T>): Promise<T> {
  const store = await FileSecretStore.open();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

/**
 * Open the store and load its key; fails with NotInitializedError before `lb init`.
 */
async function withVault<T>(fn: (store: SecretStore, key: Buffer) => Promise<T>): Promise<T> {
  return withStore(async (store) => fn(store, await getKey(store)));
}

function resolveRemote(flag: string | undefined): RemoteEndpoint | undefined {
  const value = flag ?? process.env[REMOTE_ENV];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return parseRemote(value);
}

function parseSecretName(value: string): string {
  if (value.length === 0) {
    throw new InvalidArgumentError('Secret name must not be empty.');
  }
  if (value.includes('=') || value.includes('\0')) {
    throw new InvalidArgumentError('Secret name must not contain "=" or NUL.');
  }
  // Dot segments collapse in a URL path, so the server could never serve them
  if (value === '.' || value === '..') {
    throw new InvalidArgumentError('Secret name must not be "." or "..".');
  }
  return value;
}

const REMOTE_FLAG = '-r, --remote <host:port>';
const REMOTE_HELP = `Read from a running "lb serve" instead of the local store (default: $${REMOTE_ENV})`;

// -- Public API ---

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('lb')
    .version('0.1.0')
    .description('Lockbox: encrypted local secret store')
    .enablePositionalOptions();

  program
    .command('init')
    .description('Create the store and generate its encryption key')
    .action(async () => {
      try {
        const result = await withStore(initialize);
        if (result === 'created') {
          log('Lockbox initialized successfully');
        } else {
          log('Lockbox is already initialized. Encryption key already exists.');
        }
      } catch (error: unknown) {
        outputError(error);
      }
    });

  program
    .command('set')
    .description('Encrypt and store a secret (prompts for the value when omitted)')
    .argument('<key>', 'Secret name', parseSecretName)
    .argument('[value]', 'Secret value')
    .action(async (key: string, value: string | undefined) => {
      try {
        await withVault(async (store, encKey) => {
          const secret = value ?? (await promptForSecret(key, { allowEmpty: true }));
          await putSecret(store, encKey, key, secret);
        });
        log(`Secret '${key}' set successfully`);
      } catch (error: unknown) {
        outputError(error);
      }
    });

  program
    .command('get')
    .description('Print a decrypted secret (no trailing newline)')
    .argument('<key>', 'Secret name')
    .option(REMOTE_FLAG, REMOTE_HELP)
    .action(async (key: string, options: { remote?: string }) => {
      try {
        const endpoint = resolveRemote(options.remote);
        const value = endpoint
          ? await fetchSecret(endpoint, key)
          : await withVault((store, encKey) => readSecret(store, encKey, key));
        outputRaw(value);
      } catch (error: unknown) {
        outputError(error);
      }
    });

  program
    .command('delete')
    .description('Delete a secret')
    .argument('<key>', 'Secret name')
    .action(async (key: string) => {
      try {
        await withVault((store) => store.delete(key));
        log(`Secret '${key}' deleted successfully`);
      } catch (error: unknown) {
        outputError(error);
      }
    });

  program
    .command('list')
    .description('List secret names in ascending order')
    .option('--json', 'Output as a JSON array')
    .option('-l, --long', 'Include created/updated timestamps')
    .option(REMOTE_FLAG, REMOTE_HELP)
    .action(async (options: { json?: boolean; long?: boolean; remote?: string }) => {
      try {
        const endpoint = resolveRemote(options.remote);

        if (options.long) {
          if (endpoint) {
            throw new ConfigError('--long is not available with --remote');
          }
          const entries = await withVault((store) => store.entries());
          if (options.json) {
            outputJson(entries);
          } else if (entries.length === 0) {
            log('No secrets found');
          } else {
            for (const entry of entries) {
              console.log(`${entry.key}\t${entry.createdAt}\t${entry.updatedAt}`);
            }
          }
          return;
        }

        const keys = endpoint
          ? await fetchKeys(endpoint)
          : await withVault((store) => store.list());
        if (options.json) {
          outputJson(keys);
        } else if (keys.length === 0) {
          log('No secrets found');
        } else {
          console.log(keys.join('\n'));
        }
      } catch (error: unknown) {
        outputError(error);
      }
    });

  program
    .command('env')
    .description('Print secrets as shell export lines, e.g. eval "$(lb env)"')
    .option(REMOTE_FLAG, REMOTE_HELP)
    .action(async (options: { remote?: string }) => {
      try {
        const endpoint = resolveRemote(options.remote);
        if (endpoint) {
          outputRaw(await fetchExport(endpoint));
          return;
        }
        await withVault(async (store, encKey) => {
          for await (const line of exportLines(store, encKey)) {
            outputRaw(line);
          }
        });
      } catch (error: unknown) {
        outputError(error);
      }
    });

  program
    .command('run')
    .description('Run a command with secrets in its environment: lb run -- COMMAND [ARGS...]')
    .option(REMOTE_FLAG, REMOTE_HELP)
    .argument('<command...>', 'Command and arguments')
    .passThroughOptions()
    .action(async (commandLine: string[], options: { remote?: string }) => {
      try {
        const endpoint = resolveRemote(options.remote);
        const secrets = endpoint
          ? await fetchSecrets(endpoint)
          : await withVault(readAllSecrets);

        const [command, ...args] = commandLine;
        if (command === undefined) {
          throw new ConfigError('no command provided. Usage: lb run -- command [args...]');
        }

        process.exitCode = await runWithSecrets(command, args, secrets);
      } catch (error: unknown) {
        outputError(error);
      }
    });

  program
    .command('serve')
    .description('Serve secrets read-only over HTTP on loopback (unauthenticated, unencrypted)')
    .option('-p, --port <number>', 'Listening port (default: $LOCKBOX_PORT or 8100)')
    .option('-H, --host <string>', 'Loopback interface (default: $LOCKBOX_HOST or 127.0.0.1)')
    .action(async (options: { port?: string; host?: string }) => {
      try {
        const { resolveServerConfig } = await import('./server/config.js');
        const { createServer } = await import('./server/index.js');

        const config = resolveServerConfig(options);
        const store = await FileSecretStore.open();

        let instance: Awaited<ReturnType<typeof createServer>>;
        try {
          const key = await getKey(store);
          instance = await createServer({
            port: config.port,
            host: config.host,
            context: { store, key },
          });
        } catch (error: unknown) {
          await store.close();
          throw error;
        }
        const { url, httpServer } = instance;

        log(`Server listening on ${url}`);
        log('  Endpoints: /health /secrets /secrets/:key /env');
        log('  Values are served in plaintext without authentication.');

        const shutdown = (): void => {
          log('Shutting down...');
          httpServer.close(() => {
            store.close().then(
              () => {
                log('Server stopped.');
                process.exit(0);
              },
              (error: unknown) => outputError(error),
            );
          });
          setTimeout(() => process.exit(1), 30000).unref();
        };

        process.on('SIGTERM', shutdown);
        process.on('SIGINT', shutdown);
      } catch (error: unknown) {
        outputError(error);
      }
    });

  return program;
}

// Only parse when run directly (not imported in tests).
// Resolve symlinks so `lb` (a symlink to dist/cli.js) is detected.
import { realpathSync } from 'node:fs';
const resolvedArgv = process.argv[1] ? realpathSync(process.argv[1]) : '';
const isDirectRun = resolvedArgv.endsWith('cli.ts') || resolvedArgv.endsWith('cli.js');

if (isDirectRun) {
  const program = buildProgram();
  program.parseAsync().catch((error: unknown) => {
    outputError(error);
  });
}
