import 'reflect-metadata';
import { describe, expect, it } from 'vitest';
import { validateEnvironment } from '../../src/platform/config/environment';

describe('validateEnvironment', () => {
  it('applies defaults for optional variables', () => {
    const env = validateEnvironment({ DATABASE_URL: 'postgres://localhost/vault' });

    expect(env.PORT).toBe(4000);
    expect(env.SESSION_CACHE_TTL_MS).toBe(30000);
    expect(env.KRATOS_PUBLIC_URL).toBeUndefined();
  });

  it('converts numeric strings', () => {
    const env = validateEnvironment({
      DATABASE_URL: 'postgres://localhost/vault',
      PORT: '8080',
      SESSION_CACHE_TTL_MS: '0',
      KRATOS_PUBLIC_URL: 'http://kratos:4433',
    });

    expect(env.PORT).toBe(8080);
    expect(env.SESSION_CACHE_TTL_MS).toBe(0);
    expect(env.KRATOS_PUBLIC_URL).toBe('http://kratos:4433');
  });

  it('requires DATABASE_URL', () => {
    expect(() => validateEnvironment({})).toThrow('DATABASE_URL must be a string');
  });

  it('rejects out-of-range ports', () => {
    expect(() => validateEnvironment({ DATABASE_URL: 'postgres://localhost/vault', PORT: '70000' })).toThrow(
      /^Invalid environment configuration: PORT: /
    );
  });
});
