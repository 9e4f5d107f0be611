import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { SubprocessError, errorMessage } from './errors.js';

// -- Types ---

export interface RunOptions {
  /** Base environment; defaults to the parent's. */
  readonly env?: NodeJS.ProcessEnv;
  /** Forward SIGINT/SIGTERM from this process to the child. Defaults to true. */
  readonly forwardSignals?: boolean;
}

// -- Constants ---

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

// -- Public API ---

/**
 * Overlay secrets on a base environment. Secrets win on name collisions.
 */
export function buildChildEnv(
  base: NodeJS.ProcessEnv,
  secrets: Readonly<Record<string, string>>,
): NodeJS.ProcessEnv {
  return { ...base, ...secrets };
}

/**
 * Run `command` with the secrets in its environment and inherited stdio.
 * Resolves with the child's exit code (`128 + n` when killed by signal `n`).
 *
 * @throws SubprocessError if the child cannot be started
 */
export function runWithSecrets(
  command: string,
  args: readonly string[],
  secrets: Readonly<Record<string, string>>,
  options: RunOptions = {},
): Promise<number> {
  const env = buildChildEnv(options.env ?? process.env, secrets);
  const forwardSignals = options.forwardSignals ?? true;

  return new Promise<number>((resolve, reject) => {
    const child = spawn(command, [...args], { env, stdio: 'inherit' });

    const forward = (signal: NodeJS.Signals): void => {
      child.kill(signal);
    };
    const detach = (): void => {
      for (const signal of FORWARDED_SIGNALS) {
        process.removeListener(signal, forward);
      }
    };

    if (forwardSignals) {
      for (const signal of FORWARDED_SIGNALS) {
        process.on(signal, forward);
      }
    }

    child.once('error', (error) => {
      detach();
      reject(new SubprocessError(`failed to execute command '${command}': ${errorMessage(error)}`, error));
    });

    child.once('exit', (code, signal) => {
      detach();
      resolve(exitCodeOf(code, signal));
    });
  });
}

// -- Internal Helpers ---

function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal !== null) {
    return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  }
  return 1;
}
