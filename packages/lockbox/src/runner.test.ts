import { describe, it, expect } from 'vitest';
import { buildChildEnv, runWithSecrets } from './runner.js';
import { SubprocessError } from './errors.js';

const node = process.execPath;

function runScript(
  script: string,
  secrets: Record<string, string> = {},
  env: NodeJS.ProcessEnv = {},
): Promise<number> {
  return runWithSecrets(node, ['-e', script], secrets, { env, forwardSignals: false });
}

describe('buildChildEnv', () => {
  it('should overlay secrets on the base environment', () => {
    expect(buildChildEnv({ PATH: '/bin', A: 'base' }, { A: 'secret', B: 'new' })).toEqual({
      PATH: '/bin',
      A: 'secret',
      B: 'new',
    });
  });

  it('should not modify its inputs', () => {
    const base = { A: 'base' };
    buildChildEnv(base, { A: 'secret' });
    expect(base).toEqual({ A: 'base' });
  });
});

describe('runWithSecrets', () => {
  it('should resolve with exit code 0 on success', async () => {
    expect(await runScript('process.exit(0)')).toBe(0);
  });

  it('should propagate a non-zero exit code', async () => {
    expect(await runScript('process.exit(42)')).toBe(42);
  });

  it('should expose secrets to the child', async () => {
    const code = await runScript(
      "process.exit(process.env.API_KEY === 'secret123' ? 0 : 7)",
      { API_KEY: 'secret123' },
    );
    expect(code).toBe(0);
  });

  it('should let secrets win over the base environment', async () => {
    const code = await runScript(
      "process.exit(process.env.SHARED === 'from-secret' && process.env.KEEP === 'yes' ? 0 : 7)",
      { SHARED: 'from-secret' },
      { SHARED: 'from-parent', KEEP: 'yes' },
    );
    expect(code).toBe(0);
  });

  it('should map death by signal to 128 + signal number', async () => {
    expect(await runScript("process.kill(process.pid, 'SIGTERM')")).toBe(143);
  });

  it('should throw SubprocessError when the command cannot be started', async () => {
    const promise = runWithSecrets('lockbox-no-such-command', [], {}, { env: {}, forwardSignals: false });
    await expect(promise).rejects.toBeInstanceOf(SubprocessError);
    await expect(promise).rejects.toThrow(/^failed to execute command 'lockbox-no-such-command': /);
  });

  it('should not leave signal listeners behind', async () => {
    const before = process.listenerCount('SIGTERM');
    await runWithSecrets(node, ['-e', 'process.exit(0)'], {}, { env: {} });
    expect(process.listenerCount('SIGTERM')).toBe(before);
  });
});
