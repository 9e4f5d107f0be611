import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { ServerConfig } from './types.js';

interface CliOptions {
  readonly port?: string;
  readonly host?: string;
}

export const DEFAULT_PORT = 8100;
export const DEFAULT_HOST = '127.0.0.1';

/** Hosts the server may bind to. The protocol is plaintext and unauthenticated. */
export const LOOPBACK_HOSTS: readonly string[] = ['127.0.0.1', '::1', 'localhost'];

const serverConfigSchema = z.object({
  port: z.coerce
    .number({ invalid_type_error: 'port must be a number' })
    .int('port must be an integer')
    .min(0, 'port must be between 0 and 65535')
    .max(65535, 'port must be between 0 and 65535'),
  host: z
    .string()
    .refine((host) => LOOPBACK_HOSTS.includes(host), {
      message: `host must be a loopback address (${LOOPBACK_HOSTS.join(', ')})`,
    }),
});

/**
 * Resolve server settings: CLI flag, then `LOCKBOX_PORT` / `LOCKBOX_HOST`, then defaults.
 *
 * @throws ConfigError on an invalid port or a non-loopback host
 */
export function resolveServerConfig(
  cli: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const raw = {
    port: (cli.port ?? env['LOCKBOX_PORT'] ?? String(DEFAULT_PORT)).trim(),
    host: (cli.host ?? env['LOCKBOX_HOST'] ?? DEFAULT_HOST).trim(),
  };

  if (raw.port === '') {
    throw new ConfigError('invalid server config: port must be a number');
  }

  const parsed = serverConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`invalid server config: ${issue?.message ?? 'unknown error'}`);
  }

  return parsed.data;
}
