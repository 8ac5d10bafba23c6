// @module: server-ws-sessions
// @tags: websocket, presence, registry

import { randomUUID } from 'node:crypto';
import type { RealtimeTransport } from './transport.js';

export interface ConnectionHandle {
  readonly id: string;
  readonly userId: string;
  readonly createdAt: Date;
  readonly transport: RealtimeTransport;
}

export interface RegisterResult {
  handle: ConnectionHandle;
  becameOnline: boolean;
  lastSeen: Date;
}

export interface UnregisterResult {
  handle: ConnectionHandle;
  becameOffline: boolean;
  lastSeen: Date;
}

export interface SessionRegistry {
  register(userId: string, transport: RealtimeTransport): RegisterResult;
  unregister(userId: string, connectionId: string): UnregisterResult | null;
  getConnection(connectionId: string): ConnectionHandle | undefined;
  connectionsFor(userId: string): ConnectionHandle[];
  isOnline(userId: string): boolean;
  lastSeen(userId: string): Date | null;
  onlineUserIds(): string[];
  onlineUserCount(): number;
  connectionCount(): number;
  clear(): void;
}

/**
 * Tracks every live connection per user. A user is online while at least one
 * connection is registered; `lastSeen` moves on every connect and disconnect.
 */
export const createSessionRegistry = ({
  now = () => new Date(),
  generateId = randomUUID,
}: {
  now?: () => Date;
  generateId?: () => string;
} = {}): SessionRegistry => {
  const connectionsByUser = new Map<string, Map<string, ConnectionHandle>>();
  const connectionsById = new Map<string, ConnectionHandle>();
  const lastSeenByUser = new Map<string, Date>();

  const register = (userId: string, transport: RealtimeTransport): RegisterResult => {
    const handle: ConnectionHandle = Object.freeze({
      id: generateId(),
      userId,
      createdAt: now(),
      transport,
    });

    let userConnections = connectionsByUser.get(userId);
    const becameOnline = !userConnections || userConnections.size === 0;
    if (!userConnections) {
      userConnections = new Map();
      connectionsByUser.set(userId, userConnections);
    }

    userConnections.set(handle.id, handle);
    connectionsById.set(handle.id, handle);
    lastSeenByUser.set(userId, handle.createdAt);

    return { handle, becameOnline, lastSeen: handle.createdAt };
  };

  const unregister = (userId: string, connectionId: string): UnregisterResult | null => {
    const handle = connectionsById.get(connectionId);
    if (!handle || handle.userId !== userId) {
      return null;
    }

    connectionsById.delete(connectionId);
    const userConnections = connectionsByUser.get(handle.userId);
    userConnections?.delete(connectionId);

    const becameOffline = !userConnections || userConnections.size === 0;
    if (becameOffline) {
      connectionsByUser.delete(handle.userId);
    }

    const lastSeen = now();
    lastSeenByUser.set(handle.userId, lastSeen);
    return { handle, becameOffline, lastSeen };
  };

  const connectionsFor = (userId: string): ConnectionHandle[] =>
    Array.from(connectionsByUser.get(userId)?.values() ?? []);

  return {
    register,
    unregister,
    getConnection: (connectionId) => connectionsById.get(connectionId),
    connectionsFor,
    isOnline: (userId) => (connectionsByUser.get(userId)?.size ?? 0) > 0,
    lastSeen: (userId) => lastSeenByUser.get(userId) ?? null,
    onlineUserIds: () => Array.from(connectionsByUser.keys()),
    onlineUserCount: () => connectionsByUser.size,
    connectionCount: () => connectionsById.size,
    clear: () => {
      connectionsByUser.clear();
      connectionsById.clear();
    },
  };
};
