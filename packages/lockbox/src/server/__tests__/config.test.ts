import { describe, it, expect } from 'vitest';
import { DEFAULT_HOST, DEFAULT_PORT, resolveServerConfig } from '../config.js';
import { ConfigError } from '../../errors.js';

describe('resolveServerConfig', () => {
  it('uses defaults when nothing configured', () => {
    const config = resolveServerConfig({}, {});
    expect(config).toEqual({ port: DEFAULT_PORT, host: DEFAULT_HOST });
    expect(config.port).toBe(8100);
    expect(config.host).toBe('127.0.0.1');
  });

  it('CLI args override env vars', () => {
    const config = resolveServerConfig({ port: '3000' }, { LOCKBOX_PORT: '8080' });
    expect(config.port).toBe(3000);
  });

  it('env vars override defaults', () => {
    const config = resolveServerConfig({}, { LOCKBOX_PORT: '8080', LOCKBOX_HOST: '::1' });
    expect(config).toEqual({ port: 8080, host: '::1' });
  });

  it('accepts port 0 for an ephemeral port', () => {
    expect(resolveServerConfig({ port: '0' }, {}).port).toBe(0);
  });

  it('accepts localhost', () => {
    expect(resolveServerConfig({ host: 'localhost' }, {}).host).toBe('localhost');
  });

  it('rejects a non-numeric port', () => {
    expect(() => resolveServerConfig({ port: 'abc' }, {})).toThrow(ConfigError);
    expect(() => resolveServerConfig({ port: 'abc' }, {})).toThrow(
      'invalid server config: port must be a number',
    );
  });

  it('rejects an empty port', () => {
    expect(() => resolveServerConfig({ port: '' }, {})).toThrow(
      'invalid server config: port must be a number',
    );
  });

  it('rejects a fractional port', () => {
    expect(() => resolveServerConfig({ port: '80.5' }, {})).toThrow(
      'invalid server config: port must be an integer',
    );
  });

  it('rejects a port out of range', () => {
    expect(() => resolveServerConfig({ port: '70000' }, {})).toThrow(
      'invalid server config: port must be between 0 and 65535',
    );
  });

  it('refuses to bind a non-loopback host', () => {
    expect(() => resolveServerConfig({ host: '0.0.0.0' }, {})).toThrow(
      'invalid server config: host must be a loopback address (127.0.0.1, ::1, localhost)',
    );
  });
});
