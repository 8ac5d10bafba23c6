import { describe, expect, it } from 'vitest';
import { loadConfig, resolveCorsOrigins } from '../config.js';

describe('resolveCorsOrigins', () => {
  it('returns the parsed origin for non-localhost hosts', () => {
    expect(resolveCorsOrigins('https://chat.example.com/app')).toBe('https://chat.example.com');
  });

  it('allows every localhost alias on the configured port', () => {
    expect(resolveCorsOrigins('http://localhost:5173')).toEqual([
      'http://localhost:5173',
      'http://127.0.0.1:5173',
      'http://[::1]:5173',
    ]);
  });

  it('expands 127.0.0.1 the same way', () => {
    expect(resolveCorsOrigins('http://127.0.0.1:4173')).toEqual([
      'http://localhost:4173',
      'http://127.0.0.1:4173',
      'http://[::1]:4173',
    ]);
  });

  it('falls back to the provided value when parsing fails', () => {
    expect(resolveCorsOrigins('invalid-origin')).toBe('invalid-origin');
  });
});

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3001);
    expect(config.TYPING_TTL_MS).toBe(10_000);
    expect(config.TYPING_SWEEP_INTERVAL_MS).toBe(3_000);
    expect(config.DELIVERY_TIMEOUT_MS).toBe(5_000);
    expect(config.WS_MAX_MESSAGE_BYTES).toBe(65_536);
    expect(config.JWT_ISSUER).toBe('chatwire');
  });

  it('parses numeric overrides', () => {
    const config = loadConfig({ PORT: '0', TYPING_TTL_MS: '4000', TYPING_SWEEP_INTERVAL_MS: '1000' });
    expect(config.PORT).toBe(0);
    expect(config.TYPING_TTL_MS).toBe(4_000);
    expect(config.TYPING_SWEEP_INTERVAL_MS).toBe(1_000);
  });

  it('rejects a sweep interval longer than the typing TTL', () => {
    expect(() =>
      loadConfig({ TYPING_TTL_MS: '2000', TYPING_SWEEP_INTERVAL_MS: '5000' }),
    ).toThrow(/TYPING_SWEEP_INTERVAL_MS must not exceed TYPING_TTL_MS/);
  });

  it('rejects non-numeric values for numeric settings', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/Expected numeric string but received abc/);
  });
});
