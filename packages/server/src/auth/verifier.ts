// @module: server-auth-verifier
// @tags: auth, tokens, collaborators

import type { ServerConfig } from '../config.js';
import { decodeToken } from './jwt.js';
import type { UserStore } from './store.js';
import type { AuthenticatedUser } from './types.js';

export class AuthenticationError extends Error {
  constructor(
    message: string,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

export interface TokenVerifier {
  verify(token: string): Promise<AuthenticatedUser>;
}

/**
 * Verifies the JWT signature and claims, then confirms the subject is still an
 * active account.
 */
export const createTokenVerifier = (
  config: Pick<ServerConfig, 'JWT_SECRET' | 'JWT_ISSUER' | 'JWT_AUDIENCE'>,
  userStore: UserStore,
): TokenVerifier => ({
  async verify(token: string): Promise<AuthenticatedUser> {
    let claims: AuthenticatedUser;
    try {
      claims = decodeToken(token, config);
    } catch (error) {
      throw new AuthenticationError('Token verification failed', 'Invalid token', {
        cause: error,
      });
    }

    const user = await userStore.findUserById(claims.id);
    if (!user || !user.isActive) {
      throw new AuthenticationError(
        `User ${claims.id} is unknown or inactive`,
        'User not found or inactive',
      );
    }

    return { id: user.id, username: user.username };
  },
});
