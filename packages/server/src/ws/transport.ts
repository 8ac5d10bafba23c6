// @module: server-ws-transport
// @tags: websocket, socket.io, delivery

import type { Server, Socket } from 'socket.io';
import type { OutboundEnvelope } from '@chatwire/schemas';
import type { AuthenticatedUser } from '../auth/types.js';

export interface ServerToClientEvents {
  message: (envelope: OutboundEnvelope, ack: () => void) => void;
}

export interface ClientToServerEvents {
  message: (frame: unknown) => void;
}

export interface SocketData {
  user?: AuthenticatedUser;
}

export type InterServerEvents = Record<string, never>;

export type RealtimeIoServer = Server<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

export type RealtimeSocket = Socket<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

/** Write side of one live connection. */
export interface RealtimeTransport {
  send(envelope: OutboundEnvelope): Promise<void>;
  close(): void;
}

export class DeliveryError extends Error {
  constructor(
    message: string,
    readonly connectionId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DeliveryError';
  }
}

/**
 * Emits on the `message` event and resolves once the client acknowledges it.
 * Socket.IO drops the pending acknowledgement after `ackTimeoutMs`.
 */
export const createSocketTransport = (
  socket: RealtimeSocket,
  ackTimeoutMs: number,
): RealtimeTransport => ({
  send(envelope: OutboundEnvelope): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (socket.disconnected) {
        reject(new Error(`Socket ${socket.id} is disconnected`));
        return;
      }

      socket.timeout(ackTimeoutMs).emit('message', envelope, (error: Error) => {
        if (error) {
          reject(error);
          return;
        }

        resolve();
      });
    });
  },
  close(): void {
    if (socket.connected) {
      socket.disconnect(true);
    }
  },
});
