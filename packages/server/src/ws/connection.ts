// @module: server-ws-connection
// @tags: websocket, lifecycle, presence, routing

import type { FastifyBaseLogger } from 'fastify';
import {
  AUTH_FAILURE_CLOSE_CODE,
  createOutboundEvent,
  type ChatMessagePayload,
  type HandshakeRejection,
  type OutboundEnvelope,
  type UserStatus,
} from '@chatwire/schemas';
import type { ServerConfig } from '../config.js';
import { extractHandshakeToken } from '../auth/http.js';
import type { AuthenticatedUser } from '../auth/types.js';
import { AuthenticationError, type TokenVerifier } from '../auth/verifier.js';
import type { ChatStore } from '../db/chat.js';
import type { LocationStore } from '../db/locations.js';
import { createGeofenceTracker } from '../location/geofences.js';
import { createLocationService } from '../location/service.js';
import { createLocationShareRegistry } from '../location/shares.js';
import type { MetricsBundle } from '../metrics/registry.js';
import type { NotificationDispatcher } from '../notifications/dispatcher.js';
import { createCallSignaling } from './calls.js';
import { replyError, type ConnectionContext } from './context.js';
import {
  createEventDispatcher,
  type DeliveryReport,
  type FanOutOptions,
} from './dispatcher.js';
import { createPresenceNotifier } from './presence.js';
import { decodeInboundFrame } from './protocol.js';
import { createRoomMembershipIndex } from './roomIndex.js';
import { createInboundRouter } from './router.js';
import { createSessionRegistry } from './sessionRegistry.js';
import {
  createSocketTransport,
  type RealtimeSocket,
  type RealtimeTransport,
} from './transport.js';
import { createTypingTracker } from './typing.js';

export type ConnectionState = 'connecting' | 'open' | 'closed';

export class HandshakeRejectedError extends Error {
  readonly data: HandshakeRejection;

  constructor(reason: string) {
    super('unauthorized');
    this.name = 'HandshakeRejectedError';
    this.data = { code: AUTH_FAILURE_CLOSE_CODE, reason };
  }
}

/** One authenticated connection as seen by the owner of its transport. */
export interface RealtimeConnection {
  readonly id: string;
  readonly userId: string;
  /** Settles once `connection_established` has been acknowledged. */
  readonly opened: Promise<void>;
  state(): ConnectionState;
  /** Queues a raw frame behind every frame received before it. */
  receive(raw: unknown): Promise<void>;
  close(reason: string): void;
}

export interface RealtimeServer {
  authenticate(socket: RealtimeSocket, next: (error?: Error) => void): void;
  handleConnection(socket: RealtimeSocket): void;
  openConnection(user: AuthenticatedUser, transport: RealtimeTransport): RealtimeConnection;
  sendToUser(userId: string, event: OutboundEnvelope): Promise<DeliveryReport>;
  broadcastToRoom(
    roomId: string,
    event: OutboundEnvelope,
    options?: FanOutOptions,
  ): Promise<DeliveryReport>;
  /** Fan-outs below start immediately and never wait on recipients. */
  publishNewMessage(chatId: string, message: ChatMessagePayload, senderId: string): void;
  publishMessageUpdated(chatId: string, message: ChatMessagePayload): void;
  publishMessageDeleted(chatId: string, messageId: string): void;
  isUserOnline(userId: string): boolean;
  presenceOf(userId: string): UserStatus;
  onlineUsersInChat(chatId: string): string[];
  /** Resolves once every fan-out started so far has settled. */
  idle(): Promise<void>;
  start(): void;
  shutdown(): Promise<void>;
}

export interface RealtimeServerOptions {
  config: Pick<
    ServerConfig,
    'TYPING_TTL_MS' | 'TYPING_SWEEP_INTERVAL_MS' | 'DELIVERY_TIMEOUT_MS'
  >;
  logger: FastifyBaseLogger;
  tokenVerifier: TokenVerifier;
  chatStore: ChatStore;
  locationStore: LocationStore;
  notifications: NotificationDispatcher;
  metrics: MetricsBundle;
  now?: () => Date;
}

interface ConnectionSession {
  context: ConnectionContext;
  state: ConnectionState;
  queue: Promise<void>;
}

export const createRealtimeServer = ({
  config,
  logger: baseLogger,
  tokenVerifier,
  chatStore,
  locationStore,
  notifications,
  metrics,
  now = () => new Date(),
}: RealtimeServerOptions): RealtimeServer => {
  const logger = baseLogger.child({ scope: 'ws' });
  const sessions = new Map<string, ConnectionSession>();

  const registry = createSessionRegistry({ now });
  const rooms = createRoomMembershipIndex();
  const dispatcher = createEventDispatcher({
    registry,
    rooms,
    metrics,
    logger: baseLogger.child({ scope: 'dispatch' }),
    deliveryTimeoutMs: config.DELIVERY_TIMEOUT_MS,
    onDeliveryFailure: (handle) => {
      closeConnection(handle.id, 'delivery_failed');
    },
  });
  const presence = createPresenceNotifier({ registry, rooms, dispatcher });
  const typing = createTypingTracker({
    ttlMs: config.TYPING_TTL_MS,
    sweepIntervalMs: config.TYPING_SWEEP_INTERVAL_MS,
    logger: baseLogger.child({ scope: 'typing' }),
    now: () => now().getTime(),
    onChange: (change) => {
      if (change.reason === 'expired') {
        metrics.typingExpirations.inc();
      }

      dispatcher.publish('typing_indicator', () =>
        dispatcher.broadcastToRoom(
          change.roomId,
          createOutboundEvent('typing_indicator', {
            chat_id: change.roomId,
            user_id: change.userId,
            is_typing: change.isTyping,
          }),
          { excludeUserId: change.userId },
        ),
      );
    },
  });
  const shares = createLocationShareRegistry({ now });
  const geofences = createGeofenceTracker();
  const router = createInboundRouter({
    rooms,
    typing,
    dispatcher,
    chatStore,
    calls: createCallSignaling({ dispatcher, registry, notifications }),
    locations: createLocationService({
      dispatcher,
      rooms,
      registry,
      locationStore,
      notifications,
      shares,
      geofences,
      logger: baseLogger.child({ scope: 'location' }),
      now,
    }),
    now,
  });

  const syncPresenceGauges = (): void => {
    metrics.activeConnections.set(registry.connectionCount());
    metrics.onlineUsers.set(registry.onlineUserCount());
  };

  const announce = (status: UserStatus): void => {
    dispatcher.publish('user_status', () => presence.announce(status));
  };

  function closeConnection(connectionId: string, reason: string): void {
    const session = sessions.get(connectionId);
    if (!session || session.state === 'closed') {
      return;
    }

    session.state = 'closed';
    sessions.delete(connectionId);

    const { handle, user, logger: connectionLogger } = session.context;
    const result = registry.unregister(user.id, handle.id);
    syncPresenceGauges();

    try {
      handle.transport.close();
    } catch (error) {
      connectionLogger.error({ err: error }, 'Failed to close realtime transport');
    }

    connectionLogger.info(
      { reason, becameOffline: result?.becameOffline ?? false },
      'Realtime connection closed',
    );

    if (result?.becameOffline) {
      const status = presence.snapshot(user.id, false, result.lastSeen);
      typing.clearUser(user.id, 'disconnect');
      geofences.forget(user.id);
      announce(status);
    }
  }

  const processFrame = async (session: ConnectionSession, raw: unknown): Promise<void> => {
    if (session.state !== 'open') {
      return;
    }

    const { context } = session;
    const decoded = decodeInboundFrame(raw);
    if (!decoded.ok) {
      metrics.inboundFrames.inc({ type: decoded.error.code });
      context.logger.debug(
        { code: decoded.error.code, type: decoded.type, issues: decoded.error.issues },
        'Rejected inbound frame',
      );
      await replyError(
        dispatcher,
        context,
        decoded.error.code,
        decoded.error.message,
        decoded.error.issues,
      );
      return;
    }

    const { message } = decoded;
    metrics.inboundFrames.inc({ type: message.type });

    try {
      await router.route(context, message);
    } catch (error) {
      context.logger.error(
        { err: error, type: message.type },
        'Unhandled error while processing realtime message',
      );
      await replyError(dispatcher, context, 'internal_error', 'Internal server error');
    }
  };

  const openConnection = (
    user: AuthenticatedUser,
    transport: RealtimeTransport,
  ): RealtimeConnection => {
    const { handle, becameOnline, lastSeen } = registry.register(user.id, transport);
    const connectionLogger = logger.child({ connectionId: handle.id, userId: user.id });
    const session: ConnectionSession = {
      context: { handle, user, logger: connectionLogger },
      state: 'open',
      queue: Promise.resolve(),
    };
    sessions.set(handle.id, session);
    syncPresenceGauges();
    connectionLogger.info({ becameOnline }, 'Realtime connection opened');

    if (becameOnline) {
      announce(presence.snapshot(user.id, true, lastSeen));
    }

    const greet = async (): Promise<void> => {
      await dispatcher.sendToConnection(
        handle,
        createOutboundEvent('connection_established', {
          user_id: user.id,
          connection_id: handle.id,
        }),
      );
    };

    const enqueue = (task: () => Promise<void>): Promise<void> => {
      session.queue = session.queue.then(task).catch((error: unknown) => {
        connectionLogger.error({ err: error }, 'Realtime connection task failed');
      });
      return session.queue;
    };

    const opened = enqueue(greet);

    return {
      id: handle.id,
      userId: user.id,
      opened,
      state: () => session.state,
      receive: (raw) => enqueue(() => processFrame(session, raw)),
      close: (reason) => closeConnection(handle.id, reason),
    };
  };

  const authenticate = (socket: RealtimeSocket, next: (error?: Error) => void): void => {
    const token = extractHandshakeToken({
      auth: socket.handshake.auth,
      query: socket.handshake.query,
      headers: socket.handshake.headers,
    });

    if (!token) {
      logger.warn({ socketId: socket.id }, 'Rejected realtime handshake without token');
      next(new HandshakeRejectedError('Missing token'));
      return;
    }

    void (async () => {
      let user: AuthenticatedUser;
      try {
        user = await tokenVerifier.verify(token);
      } catch (error) {
        const reason = error instanceof AuthenticationError ? error.reason : 'Invalid token';
        logger.warn({ err: error, socketId: socket.id, reason }, 'Rejected realtime auth token');
        next(new HandshakeRejectedError(reason));
        return;
      }

      socket.data.user = user;
      next();
    })().catch((error: unknown) => {
      logger.error({ err: error, socketId: socket.id }, 'Realtime handshake failed');
    });
  };

  const handleConnection = (socket: RealtimeSocket): void => {
    const user = socket.data.user;
    if (!user) {
      logger.warn({ socketId: socket.id }, 'Socket connected without an authenticated user');
      socket.disconnect(true);
      return;
    }

    const connection = openConnection(
      user,
      createSocketTransport(socket, config.DELIVERY_TIMEOUT_MS),
    );

    socket.on('message', (raw: unknown) => {
      void connection.receive(raw);
    });

    socket.on('disconnect', (reason: string) => {
      try {
        connection.close(`client:${reason}`);
      } catch (error) {
        logger.error({ err: error, connectionId: connection.id }, 'Failed to unregister realtime connection');
      }
    });

    socket.on('error', (error: Error) => {
      logger.error({ err: error, connectionId: connection.id }, 'Socket.IO transport error');
    });
  };

  const publishNewMessage = (chatId: string, message: ChatMessagePayload, senderId: string): void => {
    if (typing.isTyping(chatId, senderId)) {
      typing.setTyping(chatId, senderId, false, 'message_sent');
    }

    dispatcher.publish('new_message', () =>
      dispatcher.broadcastToRoom(chatId, createOutboundEvent('new_message', message), {
        excludeUserId: senderId,
      }),
    );
  };

  const shutdown = async (): Promise<void> => {
    typing.stop();
    for (const session of sessions.values()) {
      session.state = 'closed';
      try {
        session.context.handle.transport.close();
      } catch (error) {
        session.context.logger.error({ err: error }, 'Error while closing realtime socket');
      }
      session.context.logger.info({ reason: 'server_shutdown' }, 'Realtime connection closed');
    }

    sessions.clear();
    registry.clear();
    rooms.clear();
    shares.clear();
    syncPresenceGauges();
    await dispatcher.drain();
  };

  return {
    authenticate,
    handleConnection,
    openConnection,
    sendToUser: (userId, event) => dispatcher.sendToUser(userId, event),
    broadcastToRoom: (roomId, event, options) => dispatcher.broadcastToRoom(roomId, event, options),
    publishNewMessage,
    publishMessageUpdated: (chatId, message) => {
      dispatcher.publish('message_updated', () =>
        dispatcher.broadcastToRoom(chatId, createOutboundEvent('message_updated', message)),
      );
    },
    publishMessageDeleted: (chatId, messageId) => {
      dispatcher.publish('message_deleted', () =>
        dispatcher.broadcastToRoom(
          chatId,
          createOutboundEvent('message_deleted', { message_id: messageId, chat_id: chatId }),
        ),
      );
    },
    isUserOnline: (userId) => registry.isOnline(userId),
    presenceOf: (userId) => presence.statusOf(userId),
    onlineUsersInChat: (chatId) => presence.onlineMembers(chatId),
    idle: () => dispatcher.drain(),
    start: () => typing.start(),
    shutdown,
  };
};
