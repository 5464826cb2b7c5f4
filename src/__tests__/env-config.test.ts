import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadAppConfigFromEnv } from '../server/config.js';

const OLD_ENV = { ...process.env };

const KEYS = [
  'OSC_LISTEN_HOST',
  'OSC_LISTEN_PORT',
  'OSC_TARGET_HOST',
  'OSC_TARGET_PORT',
  'OSC_ECHO_ADDRESS',
  'OSC_ECHO_DELAY_MS',
];

describe('loadAppConfigFromEnv', () => {
  beforeEach(() => {
    process.env = { ...OLD_ENV };
    for (const key of KEYS) delete process.env[key];
  });

  afterEach(() => {
    process.env = { ...OLD_ENV };
  });

  it('returns defaults when env is not set', () => {
    const c = loadAppConfigFromEnv();
    expect(c.listen).toEqual({ host: '127.0.0.1', port: 19994 });
    expect(c.target).toEqual({ host: '127.0.0.1', port: 19994 });
    expect(c.echo).toEqual({ address: '/some/addr', delayMs: 500 });
  });

  it('parses valid env values', () => {
    process.env['OSC_LISTEN_HOST'] = '0.0.0.0';
    process.env['OSC_LISTEN_PORT'] = '9010';
    process.env['OSC_TARGET_HOST'] = '192.168.0.10';
    process.env['OSC_TARGET_PORT'] = '7000';
    process.env['OSC_ECHO_ADDRESS'] = '/bot/say';
    process.env['OSC_ECHO_DELAY_MS'] = '0';
    const c = loadAppConfigFromEnv();
    expect(c.listen).toEqual({ host: '0.0.0.0', port: 9010 });
    expect(c.target).toEqual({ host: '192.168.0.10', port: 7000 });
    expect(c.echo).toEqual({ address: '/bot/say', delayMs: 0 });
  });

  it('throws on invalid port', () => {
    process.env['OSC_TARGET_PORT'] = 'abc';
    expect(() => loadAppConfigFromEnv()).toThrow();
  });

  it('throws on an address without a leading slash', () => {
    process.env['OSC_ECHO_ADDRESS'] = 'bot/say';
    expect(() => loadAppConfigFromEnv()).toThrow();
  });
});
