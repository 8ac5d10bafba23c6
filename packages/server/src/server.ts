// @module: server-runtime
// @tags: fastify, websocket, infrastructure

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { Server as SocketIOServer } from 'socket.io';
import type { ReadinessController } from './readiness.js';
import type { ServerConfig } from './config.js';
import { resolveCorsOrigins } from './config.js';
import { messageRoutes } from './api/messages.js';
import { presenceRoutes } from './api/presence.js';
import { createUserStore, type UserStore } from './auth/store.js';
import { createTokenVerifier } from './auth/verifier.js';
import { createChatStore, type ChatStore } from './db/chat.js';
import { createDeviceTokenStore, type DeviceTokenStore } from './db/devices.js';
import { createLocationStore, type LocationStore } from './db/locations.js';
import { runMigrations } from './db/migrations.js';
import { createPgPool } from './db/pool.js';
import { createMetricsBundle, type MetricsBundle } from './metrics/registry.js';
import {
  createLoggingPushGateway,
  createNotificationDispatcher,
  type PushGateway,
} from './notifications/dispatcher.js';
import { createRealtimeServer, type RealtimeServer } from './ws/connection.js';
import type {
  ClientToServerEvents,
  InterServerEvents,
  RealtimeIoServer,
  ServerToClientEvents,
  SocketData,
} from './ws/transport.js';

export interface ServerCollaborators {
  userStore: UserStore;
  chatStore: ChatStore;
  locationStore: LocationStore;
  deviceTokenStore: DeviceTokenStore;
  pushGateway?: PushGateway;
}

export interface CreateServerOptions {
  config: ServerConfig;
  readiness: ReadinessController;
  /** Defaults to pg-backed stores on a migrated pool. */
  collaborators?: ServerCollaborators;
  metrics?: MetricsBundle;
}

export interface ServerHandle {
  app: FastifyInstance;
  realtime: RealtimeServer;
  io: RealtimeIoServer;
}

export const createServer = async ({
  config,
  readiness,
  collaborators,
  metrics = createMetricsBundle(),
}: CreateServerOptions): Promise<ServerHandle> => {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
    },
  });

  let closePool: (() => Promise<void>) | null = null;
  let stores: ServerCollaborators;
  if (collaborators) {
    stores = collaborators;
  } else {
    const pool = createPgPool(config);
    await runMigrations(pool, app.log.child({ scope: 'migrations' }));
    closePool = () => pool.end();
    stores = {
      userStore: createUserStore(pool),
      chatStore: createChatStore(pool),
      locationStore: createLocationStore(pool),
      deviceTokenStore: createDeviceTokenStore(pool),
    };
  }

  const tokenVerifier = createTokenVerifier(config, stores.userStore);
  const notifications = createNotificationDispatcher({
    deviceTokenStore: stores.deviceTokenStore,
    gateway: stores.pushGateway ?? createLoggingPushGateway(app.log.child({ scope: 'push' })),
    logger: app.log.child({ scope: 'notifications' }),
  });
  const realtime = createRealtimeServer({
    config,
    logger: app.log,
    tokenVerifier,
    chatStore: stores.chatStore,
    locationStore: stores.locationStore,
    notifications,
    metrics,
  });

  app.decorate('readiness', readiness);
  const corsOrigins = resolveCorsOrigins(config.CLIENT_ORIGIN);
  await app.register(cors, {
    origin: corsOrigins,
    credentials: true,
  });

  await app.register(messageRoutes, {
    prefix: '/api/v1',
    tokenVerifier,
    chatStore: stores.chatStore,
    realtime,
  });
  await app.register(presenceRoutes, {
    prefix: '/api/v1',
    tokenVerifier,
    realtime,
  });

  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const controller = app.readiness;
    if (!controller.isReady()) {
      await reply.code(503).send({ status: controller.state() });
      return;
    }

    return { status: 'ready' };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', metrics.registry.contentType);
    return reply.send(await metrics.registry.metrics());
  });

  const io: RealtimeIoServer = new SocketIOServer<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    SocketData
  >(app.server, {
    path: '/ws',
    maxHttpBufferSize: config.WS_MAX_MESSAGE_BYTES,
    transports: ['websocket'],
    cors: {
      origin: corsOrigins,
      credentials: true,
    },
  });

  io.use((socket, next) => realtime.authenticate(socket, next));
  io.on('connection', (socket) => {
    realtime.handleConnection(socket);
  });
  realtime.start();

  app.addHook('preClose', async () => {
    await realtime.shutdown();
  });

  app.addHook('onClose', async () => {
    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });
    if (closePool) {
      await closePool();
    }
  });

  return { app, realtime, io };
};
