// @module: server-auth-jwt
// @tags: auth, jwt, tokens

import jwt from 'jsonwebtoken';
import type { ServerConfig } from '../config.js';
import type { AuthenticatedUser } from './types.js';

export interface TokenClaims extends jwt.JwtPayload {
  sub: string;
  username?: string;
}

type TokenConfig = Pick<ServerConfig, 'JWT_SECRET' | 'JWT_ISSUER' | 'JWT_AUDIENCE'>;

function assertValidClaims(
  claims: jwt.JwtPayload,
): asserts claims is TokenClaims {
  if (typeof claims.sub !== 'string' || claims.sub.length === 0) {
    throw new Error('Token is missing required subject claim');
  }
}

/**
 * Signs an access token. Issuance belongs to the identity service; the server
 * only uses this for local tooling and tests.
 */
export const signToken = (
  user: { id: string; username?: string },
  config: TokenConfig,
  expiresInSeconds = 3600,
): string => {
  const payload: TokenClaims = {
    sub: user.id,
    username: user.username,
  };

  return jwt.sign(payload, config.JWT_SECRET, {
    issuer: config.JWT_ISSUER,
    audience: config.JWT_AUDIENCE,
    expiresIn: expiresInSeconds,
  });
};

export const decodeToken = (
  token: string,
  config: TokenConfig,
): AuthenticatedUser => {
  const decoded = jwt.verify(token, config.JWT_SECRET, {
    issuer: config.JWT_ISSUER,
    audience: config.JWT_AUDIENCE,
  });

  if (typeof decoded === 'string') {
    throw new Error('Unexpected token payload type');
  }

  assertValidClaims(decoded);

  return {
    id: decoded.sub,
    username: typeof decoded.username === 'string' ? decoded.username : null,
  };
};
