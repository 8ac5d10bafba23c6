import type { FastifyPluginCallback } from 'fastify';
import { z } from 'zod';
import { userIdSchema } from '@chatwire/schemas';
import type { TokenVerifier } from '../auth/verifier.js';
import type { RealtimeServer } from '../ws/connection.js';
import { createRequestAuthenticator } from './guard.js';

interface PresenceRoutesOptions {
  tokenVerifier: TokenVerifier;
  realtime: Pick<RealtimeServer, 'presenceOf'>;
}

const presenceParamsSchema = z.object({ userId: userIdSchema });

export const presenceRoutes: FastifyPluginCallback<PresenceRoutesOptions> = (
  app,
  options,
  done,
) => {
  const authenticate = createRequestAuthenticator(options.tokenVerifier, app.log);

  app.get('/users/:userId/presence', async (request, reply) => {
    if (!(await authenticate(request))) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = presenceParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply
        .code(400)
        .send({ message: 'Invalid route parameters', issues: paramsResult.error.issues });
      return;
    }

    return options.realtime.presenceOf(paramsResult.data.userId);
  });

  done();
};
