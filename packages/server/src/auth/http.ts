// @module: server-auth-http
// @tags: auth, http, websocket

export const extractBearerToken = (authorization?: string): string | null => {
  if (!authorization) {
    return null;
  }

  const [scheme, token] = authorization.split(' ');
  if (!scheme || scheme.toLowerCase() !== 'bearer' || !token) {
    return null;
  }

  return token.trim();
};

export interface HandshakeCredentials {
  auth: Record<string, unknown>;
  query: Record<string, unknown>;
  headers: Record<string, string | string[] | undefined>;
}

const firstString = (value: unknown): string | null => {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }

  if (Array.isArray(value)) {
    return firstString(value[0]);
  }

  return null;
};

/**
 * Looks for the bearer credential in the Socket.IO `auth` payload, then the
 * `token` query parameter, then the Authorization header.
 */
export const extractHandshakeToken = (handshake: HandshakeCredentials): string | null => {
  const fromAuth = firstString(handshake.auth.token);
  if (fromAuth) {
    return fromAuth;
  }

  const fromQuery = firstString(handshake.query.token);
  if (fromQuery) {
    return fromQuery;
  }

  const header = firstString(handshake.headers.authorization);
  return header ? extractBearerToken(header) : null;
};
