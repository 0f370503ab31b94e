import { afterEach, describe, expect, it } from 'vitest';
import { readServerEnv } from './env.js';

const ORIGINAL_ENV = { ...process.env };

afterEach(() => {
  process.env = { ...ORIGINAL_ENV };
});

describe('server env contract', () => {
  it('uses development defaults when env vars are unset', () => {
    delete process.env.PORT;
    delete process.env.HOST;
    delete process.env.CORS_ORIGINS;
    process.env.NODE_ENV = 'development';

    const env = readServerEnv();
    expect(env.port).toBe(5000);
    expect(env.host).toBe('0.0.0.0');
    expect(env.corsOrigins).toEqual([]);
    expect(env.isProduction).toBe(false);
    expect(env.isCorsOriginAllowed('http://localhost:5173')).toBe(true);
    expect(env.isCorsOriginAllowed('http://192.168.1.20:5000')).toBe(true);
    expect(env.isCorsOriginAllowed(undefined)).toBe(true);
  });

  it('rejects a non-numeric PORT', () => {
    process.env.PORT = 'eighty';
    expect(() => readServerEnv()).toThrow('Invalid PORT value "eighty"');
  });

  it('requires CORS_ORIGINS in production', () => {
    delete process.env.CORS_ORIGINS;
    process.env.NODE_ENV = 'production';
    expect(() => readServerEnv()).toThrow(/CORS_ORIGINS is required/i);
  });

  it('parses CORS allowlist entries and enforces them in production', () => {
    process.env.NODE_ENV = 'production';
    process.env.CORS_ORIGINS = 'https://draw.example.org, https://cards.example.org';

    const env = readServerEnv();
    expect(env.corsOrigins).toEqual(['https://draw.example.org', 'https://cards.example.org']);
    expect(env.isCorsOriginAllowed('https://draw.example.org')).toBe(true);
    expect(env.isCorsOriginAllowed('https://cards.example.org')).toBe(true);
    expect(env.isCorsOriginAllowed('http://localhost:5173')).toBe(false);
    expect(env.isCorsOriginAllowed('https://evil.example')).toBe(false);
  });
});
