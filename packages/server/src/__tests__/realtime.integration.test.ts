import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { io, type Socket } from 'socket.io-client';
import { realtimeEnvelopeSchema, type RealtimeEnvelope } from '@chatwire/schemas';
import type { FastifyInstance } from 'fastify';
import { signToken } from '../auth/jwt.js';
import { loadConfig, type ServerConfig } from '../config.js';
import { createMetricsBundle } from '../metrics/registry.js';
import { createReadinessController, type ReadinessController } from '../readiness.js';
import { createServer } from '../server.js';
import {
  createMemoryChatStore,
  createMemoryDeviceTokenStore,
  createMemoryLocationStore,
  createMemoryUserStore,
  createRecordingPushGateway,
} from './helpers/memoryStores.js';

interface Waiter {
  predicate: (envelope: RealtimeEnvelope) => boolean;
  resolve: (envelope: RealtimeEnvelope) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

class RealtimeTestClient {
  private readonly socket: Socket;
  private waiters: Waiter[] = [];
  readonly messages: RealtimeEnvelope[] = [];

  constructor(
    private readonly label: string,
    baseUrl: string,
    token: string | null,
  ) {
    this.socket = io(baseUrl, {
      autoConnect: false,
      forceNew: true,
      path: '/ws',
      transports: ['websocket'],
      reconnection: false,
      auth: token ? { token } : {},
    });

    this.socket.on('message', (raw: unknown, ack?: () => void) => {
      ack?.();
      const parsed = realtimeEnvelopeSchema.safeParse(raw);
      if (!parsed.success) {
        return;
      }

      const envelope = parsed.data;
      this.messages.push(envelope);
      for (const waiter of [...this.waiters]) {
        if (waiter.predicate(envelope)) {
          this.clearWaiter(waiter);
          waiter.resolve(envelope);
        }
      }
    });
  }

  private clearWaiter(waiter: Waiter): void {
    clearTimeout(waiter.timeout);
    this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
  }

  connect(): Promise<RealtimeEnvelope> {
    const established = this.waitFor('connection_established');
    return new Promise<void>((resolve, reject) => {
      this.socket.once('connect', () => resolve());
      this.socket.once('connect_error', (error) => reject(error));
      this.socket.connect();
    }).then(() => established);
  }

  /** Resolves with the error Socket.IO raises when the handshake is refused. */
  rejectedHandshake(): Promise<Error> {
    return new Promise<Error>((resolve, reject) => {
      this.socket.once('connect', () => reject(new Error(`${this.label} connected unexpectedly`)));
      this.socket.once('connect_error', (error) => resolve(error));
      this.socket.connect();
    });
  }

  send(type: string, data: Record<string, unknown>): void {
    this.socket.emit('message', { type, data });
  }

  ofType(type: string): RealtimeEnvelope[] {
    return this.messages.filter((message) => message.type === type);
  }

  waitFor(
    type: string,
    predicate: (envelope: RealtimeEnvelope) => boolean = () => true,
    timeoutMs = 5_000,
  ): Promise<RealtimeEnvelope> {
    const matches = (envelope: RealtimeEnvelope): boolean =>
      envelope.type === type && predicate(envelope);
    const existing = this.messages.find(matches);
    if (existing) {
      return Promise.resolve(existing);
    }

    return new Promise<RealtimeEnvelope>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.waiters = this.waiters.filter((candidate) => candidate.timeout !== timeout);
        reject(new Error(`Timed out waiting for ${type} on ${this.label}`));
      }, timeoutMs);

      this.waiters.push({ predicate: matches, resolve, reject, timeout });
    });
  }

  close(): void {
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timeout);
    }
    this.waiters = [];
    this.socket.disconnect();
  }
}

describe('realtime server over Socket.IO', () => {
  let config: ServerConfig;
  let app: FastifyInstance;
  let readiness: ReadinessController;
  let baseUrl: string;
  const clients: RealtimeTestClient[] = [];

  const tokenFor = (userId: string): string => signToken({ id: userId }, config);

  const createClient = (label: string, token: string | null): RealtimeTestClient => {
    const client = new RealtimeTestClient(label, baseUrl, token);
    clients.push(client);
    return client;
  };

  const connectAs = async (userId: string): Promise<RealtimeTestClient> => {
    const client = createClient(userId, tokenFor(userId));
    await client.connect();
    return client;
  };

  const joinChat = async (client: RealtimeTestClient, chatId: string): Promise<void> => {
    client.send('join_chat', { chat_id: chatId });
    await client.waitFor('chat_joined', (envelope) => envelope.data.chat_id === chatId);
  };

  beforeEach(async () => {
    config = loadConfig({
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      HOST: '127.0.0.1',
      PORT: '0',
      JWT_SECRET: 'test-secret',
      DELIVERY_TIMEOUT_MS: '2000',
    });
    readiness = createReadinessController();

    const server = await createServer({
      config,
      readiness,
      metrics: createMetricsBundle({ collectDefaults: false }),
      collaborators: {
        userStore: createMemoryUserStore([
          { id: 'alice', username: 'alice', isActive: true },
          { id: 'bob', username: 'bob', isActive: true },
          { id: 'mallory', username: 'mallory', isActive: false },
        ]),
        chatStore: createMemoryChatStore({ 'chat-1': ['alice', 'bob'] }),
        locationStore: createMemoryLocationStore(),
        deviceTokenStore: createMemoryDeviceTokenStore([]),
        pushGateway: createRecordingPushGateway(),
      },
    });
    app = server.app;

    await app.listen({ host: config.HOST, port: 0 });
    const address = app.server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Failed to determine server address for tests');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.close();
    }
    await app.close();
  });

  it('delivers typing to the other member and not to the typist', async () => {
    const alice = await connectAs('alice');
    const bob = await connectAs('bob');
    await joinChat(alice, 'chat-1');
    await joinChat(bob, 'chat-1');

    alice.send('typing_indicator', { chat_id: 'chat-1', is_typing: true });
    const typing = await bob.waitFor('typing_indicator');

    expect(typing.data).toEqual({ chat_id: 'chat-1', user_id: 'alice', is_typing: true });

    alice.send('ping', { timestamp: 1 });
    await alice.waitFor('pong');
    expect(alice.ofType('typing_indicator')).toEqual([]);
  });

  it('tells room peers when a user goes offline', async () => {
    const alice = await connectAs('alice');
    const bob = await connectAs('bob');
    await joinChat(alice, 'chat-1');
    await joinChat(bob, 'chat-1');

    bob.close();
    const status = await alice.waitFor('user_status');

    expect(status.data).toEqual({
      user_id: 'bob',
      is_online: false,
      last_seen: expect.any(String),
    });
  });

  it('answers ping on the sending connection only', async () => {
    const phone = await connectAs('alice');
    const laptop = await connectAs('alice');

    phone.send('ping', { timestamp: 1717171717 });
    const pong = await phone.waitFor('pong');
    expect(pong.data).toEqual({ timestamp: 1717171717 });

    laptop.send('ping', { timestamp: 2 });
    await laptop.waitFor('pong');
    expect(laptop.ofType('pong').map((envelope) => envelope.data)).toEqual([{ timestamp: 2 }]);
  });

  it('replies with a scoped error for unknown types', async () => {
    const alice = await connectAs('alice');

    alice.send('teleport', {});
    const error = await alice.waitFor('error');

    expect(error.data).toEqual({ code: 'unknown_type', message: 'Unknown message type: teleport' });
  });

  it.each([
    ['a missing token', null, 'Missing token'],
    ['a forged token', 'not-a-jwt', 'Invalid token'],
  ])('refuses a handshake with %s', async (_label, token, reason) => {
    const client = createClient('anonymous', token);
    const error = await client.rejectedHandshake();

    expect(error.message).toBe('unauthorized');
    expect('data' in error ? error.data : undefined).toEqual({ code: 4001, reason });
  });

  it('refuses an inactive account', async () => {
    const client = createClient('mallory', tokenFor('mallory'));
    const error = await client.rejectedHandshake();

    expect('data' in error ? error.data : undefined).toEqual({
      code: 4001,
      reason: 'User not found or inactive',
    });
  });

  it('publishes messages created over REST to the room', async () => {
    const alice = await connectAs('alice');
    const bob = await connectAs('bob');
    await joinChat(alice, 'chat-1');
    await joinChat(bob, 'chat-1');

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/chats/chat-1/messages',
      headers: { authorization: `Bearer ${tokenFor('alice')}` },
      payload: { content: 'hello bob' },
    });
    expect(response.statusCode).toBe(201);

    const message = await bob.waitFor('new_message');
    expect(message.data).toMatchObject({
      chat_id: 'chat-1',
      sender_id: 'alice',
      content: 'hello bob',
      message_type: 'text',
    });
  });

  it('reports readiness and metrics', async () => {
    const starting = await app.inject({ method: 'GET', url: '/readyz' });
    expect(starting.statusCode).toBe(503);
    expect(starting.json()).toEqual({ status: 'starting' });

    readiness.markReady();
    const ready = await app.inject({ method: 'GET', url: '/readyz' });
    expect(ready.json()).toEqual({ status: 'ready' });

    await connectAs('alice');
    const metrics = await app.inject({ method: 'GET', url: '/metrics' });
    expect(metrics.body).toContain('chatwire_realtime_connections 1');
  });
});
