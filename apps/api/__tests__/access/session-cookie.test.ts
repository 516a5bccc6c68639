import { describe, expect, it } from 'vitest';
import { parseCookies, readSessionToken } from '../../src/access/presentation/session-cookie';

describe('session cookies', () => {
  it('parses cookie header into key/value pairs', () => {
    expect(parseCookies('vault_session=abc123; theme=light')).toEqual({
      vault_session: 'abc123',
      theme: 'light',
    });
  });

  it('keeps "=" inside cookie values', () => {
    expect(parseCookies('vault_session=a=b')).toEqual({ vault_session: 'a=b' });
  });

  it('returns empty object for empty header', () => {
    expect(parseCookies(undefined)).toEqual({});
  });
});

describe('readSessionToken', () => {
  it('prefers the session header over the cookie', () => {
    expect(readSessionToken({ 'x-session-token': 'from-header', cookie: 'vault_session=from-cookie' })).toBe(
      'from-header'
    );
  });

  it('falls back to the session cookie', () => {
    expect(readSessionToken({ cookie: 'theme=dark; vault_session=from-cookie' })).toBe('from-cookie');
  });

  it('returns undefined without either', () => {
    expect(readSessionToken({ cookie: 'theme=dark' })).toBeUndefined();
    expect(readSessionToken({})).toBeUndefined();
  });
});
