// @module: server-ws-context
// @tags: websocket, replies

import type { FastifyBaseLogger } from 'fastify';
import {
  createOutboundEvent,
  type OutboundEnvelope,
  type RealtimeErrorCode,
} from '@chatwire/schemas';
import type { AuthenticatedUser } from '../auth/types.js';
import type { EventDispatcher } from './dispatcher.js';
import type { ConnectionHandle } from './sessionRegistry.js';

/** The connection an inbound frame arrived on. */
export interface ConnectionContext {
  handle: ConnectionHandle;
  user: AuthenticatedUser;
  logger: FastifyBaseLogger;
}

export const reply = (
  dispatcher: EventDispatcher,
  context: ConnectionContext,
  event: OutboundEnvelope,
): Promise<boolean> => dispatcher.sendToConnection(context.handle, event);

export const replyError = (
  dispatcher: EventDispatcher,
  context: ConnectionContext,
  code: RealtimeErrorCode,
  message: string,
  issues?: unknown[],
): Promise<boolean> =>
  reply(
    dispatcher,
    context,
    createOutboundEvent('error', issues ? { code, message, issues } : { code, message }),
  );
