export const SESSION_COOKIE_NAME = 'vault_session';
export const SESSION_TOKEN_HEADER = 'x-session-token';

export const parseCookies = (header: string | undefined): Record<string, string> => {
  if (!header) return {};
  return header.split(';').reduce<Record<string, string>>((acc, pair) => {
    const [rawName, ...rest] = pair.trim().split('=');
    if (!rawName || rest.length === 0) return acc;
    acc[decodeURIComponent(rawName)] = decodeURIComponent(rest.join('='));
    return acc;
  }, {});
};

/**
 * Session token from the `x-session-token` header, falling back to the
 * session cookie.
 */
export const readSessionToken = (headers: Readonly<Record<string, string | string[] | undefined>>): string | undefined => {
  const header = headers[SESSION_TOKEN_HEADER];
  if (typeof header === 'string' && header) return header;
  if (Array.isArray(header) && header[0]) return header[0];
  const cookieHeader = headers.cookie;
  const cookies = parseCookies(typeof cookieHeader === 'string' ? cookieHeader : undefined);
  return cookies[SESSION_COOKIE_NAME];
};
