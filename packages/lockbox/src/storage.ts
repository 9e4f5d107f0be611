import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

const CONFIG_DIR_NAME = '.lockbox';
const STORE_FILENAME = 'lockbox.json';
const LOCK_TIMEOUT_MS = 5000;
const LOCK_RETRY_MS = 50;

export const STORE_PATH_ENV = 'LOCKBOX_DB_PATH';

export function getConfigDir(): string {
  return path.join(os.homedir(), CONFIG_DIR_NAME);
}

/**
 * Store file location: `$LOCKBOX_DB_PATH` when set, else `~/.lockbox/lockbox.json`.
 */
export function resolveStorePath(env: NodeJS.ProcessEnv = process.env): string {
  const custom = env[STORE_PATH_ENV];
  if (custom) {
    return path.resolve(custom);
  }
  return path.join(getConfigDir(), STORE_FILENAME);
}

export function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { mode: 0o700, recursive: true });
  }
}

export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

/**
 * Replace a JSON file atomically and durably: write a sibling temp file,
 * fsync it, rename it over the target, then fsync the directory.
 */
export function writeJsonFileDurable(filePath: string, data: unknown): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  const content = JSON.stringify(data, null, 2) + '\n';

  const fd = fs.openSync(tmpPath, 'w', 0o600);
  try {
    fs.writeSync(fd, content);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }

  try {
    fs.renameSync(tmpPath, filePath);
  } catch (error: unknown) {
    fs.rmSync(tmpPath, { force: true });
    throw error;
  }

  syncDir(dir);
}

/**
 * Acquire a file-system lock beside `filePath` (mkdir-based, atomic on all platforms).
 * Returns a release function. Throws after timeout.
 */
export async function acquireLock(filePath: string): Promise<() => void> {
  const lockDir = `${filePath}.lock`;
  const deadline = Date.now() + LOCK_TIMEOUT_MS;

  while (Date.now() < deadline) {
    if (tryMkdir(lockDir)) {
      return () => releaseLock(lockDir);
    }
    await new Promise((resolve) => setTimeout(resolve, LOCK_RETRY_MS));
  }

  // Stale lock: the holder died without releasing it
  if (isStale(lockDir)) {
    fs.rmSync(lockDir, { recursive: true, force: true });
    if (tryMkdir(lockDir)) {
      return () => releaseLock(lockDir);
    }
  }

  throw new Error(`Failed to acquire lock "${lockDir}" within ${LOCK_TIMEOUT_MS}ms`);
}

// -- Internal Helpers ---

function tryMkdir(dir: string): boolean {
  try {
    fs.mkdirSync(dir);
    return true;
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

function releaseLock(lockDir: string): void {
  fs.rmSync(lockDir, { recursive: true, force: true });
}

function isStale(lockDir: string): boolean {
  try {
    return Date.now() - fs.statSync(lockDir).mtimeMs > LOCK_TIMEOUT_MS;
  } catch {
    // Released between our last attempt and now
    return true;
  }
}

function syncDir(dir: string): void {
  // Directories cannot be opened for fsync on Windows
  if (process.platform === 'win32') return;

  const fd = fs.openSync(dir, 'r');
  try {
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
