import type { FastifyBaseLogger, FastifyRequest } from 'fastify';
import { extractBearerToken } from '../auth/http.js';
import type { AuthenticatedUser } from '../auth/types.js';
import type { TokenVerifier } from '../auth/verifier.js';

export type RequestAuthenticator = (request: FastifyRequest) => Promise<AuthenticatedUser | null>;

export const createRequestAuthenticator =
  (tokenVerifier: TokenVerifier, logger: FastifyBaseLogger): RequestAuthenticator =>
  async (request) => {
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      return null;
    }

    try {
      return await tokenVerifier.verify(token);
    } catch (error) {
      logger.warn({ err: error, route: request.url }, 'Rejected bearer token');
      return null;
    }
  };
