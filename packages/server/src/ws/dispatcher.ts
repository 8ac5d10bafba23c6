// @module: server-ws-dispatcher
// @tags: websocket, fan-out, delivery

import type { FastifyBaseLogger } from 'fastify';
import type { OutboundEnvelope } from '@chatwire/schemas';
import type { MetricsBundle } from '../metrics/registry.js';
import type { RoomMembershipIndex } from './roomIndex.js';
import type { ConnectionHandle, SessionRegistry } from './sessionRegistry.js';
import { DeliveryError } from './transport.js';

export interface DeliveryReport {
  delivered: number;
  failed: number;
}

export interface FanOutOptions {
  excludeUserId?: string;
}

export interface EventDispatcher {
  sendToConnection(handle: ConnectionHandle, event: OutboundEnvelope): Promise<boolean>;
  sendToUser(userId: string, event: OutboundEnvelope): Promise<DeliveryReport>;
  sendToUsers(
    userIds: Iterable<string>,
    event: OutboundEnvelope,
    options?: FanOutOptions,
  ): Promise<DeliveryReport>;
  broadcastToRoom(
    roomId: string,
    event: OutboundEnvelope,
    options?: FanOutOptions,
  ): Promise<DeliveryReport>;
  /**
   * Starts work addressed to other users without waiting for it. The caller's
   * own work carries on while slow recipients run out their deadline.
   */
  publish(description: string, delivery: () => Promise<unknown>): void;
  /** Resolves once everything started through `publish` has settled. */
  drain(): Promise<void>;
  inFlight(): number;
}

export interface EventDispatcherOptions {
  registry: SessionRegistry;
  rooms: RoomMembershipIndex;
  metrics: Pick<MetricsBundle, 'deliveredEvents' | 'failedDeliveries'>;
  logger: FastifyBaseLogger;
  deliveryTimeoutMs: number;
  /** Invoked once per failed write; the owner tears the connection down. */
  onDeliveryFailure: (handle: ConnectionHandle, error: unknown) => void;
}

const EMPTY_REPORT: DeliveryReport = Object.freeze({ delivered: 0, failed: 0 });

const mergeReports = (reports: DeliveryReport[]): DeliveryReport =>
  reports.reduce<DeliveryReport>(
    (total, report) => ({
      delivered: total.delivered + report.delivered,
      failed: total.failed + report.failed,
    }),
    EMPTY_REPORT,
  );

export const withDeadline = <T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    Promise.resolve()
      .then(operation)
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
  });

/**
 * Writes events to live connections. Each write carries its own deadline and
 * a failing connection never blocks delivery to the others.
 */
export const createEventDispatcher = ({
  registry,
  rooms,
  metrics,
  logger,
  deliveryTimeoutMs,
  onDeliveryFailure,
}: EventDispatcherOptions): EventDispatcher => {
  const sendToConnection = async (
    handle: ConnectionHandle,
    event: OutboundEnvelope,
  ): Promise<boolean> => {
    try {
      await withDeadline(
        () => handle.transport.send(event),
        deliveryTimeoutMs,
        () =>
          new DeliveryError(
            `Delivery of ${event.type} timed out after ${deliveryTimeoutMs}ms`,
            handle.id,
          ),
      );
      metrics.deliveredEvents.inc({ type: event.type });
      return true;
    } catch (error) {
      metrics.failedDeliveries.inc({ type: event.type });
      logger.warn(
        { err: error, connectionId: handle.id, userId: handle.userId, type: event.type },
        'Failed to deliver realtime event; dropping connection',
      );

      try {
        onDeliveryFailure(handle, error);
      } catch (teardownError) {
        logger.error(
          { err: teardownError, connectionId: handle.id },
          'Failed to tear down connection after delivery failure',
        );
      }
      return false;
    }
  };

  const sendToUser = async (userId: string, event: OutboundEnvelope): Promise<DeliveryReport> => {
    const connections = registry.connectionsFor(userId);
    if (connections.length === 0) {
      return EMPTY_REPORT;
    }

    const results = await Promise.allSettled(
      connections.map((handle) => sendToConnection(handle, event)),
    );
    const delivered = results.filter(
      (result) => result.status === 'fulfilled' && result.value,
    ).length;
    return { delivered, failed: results.length - delivered };
  };

  const sendToUsers = async (
    userIds: Iterable<string>,
    event: OutboundEnvelope,
    { excludeUserId }: FanOutOptions = {},
  ): Promise<DeliveryReport> => {
    const recipients = new Set(userIds);
    if (excludeUserId !== undefined) {
      recipients.delete(excludeUserId);
    }

    const settled = await Promise.allSettled(
      Array.from(recipients, (userId) => sendToUser(userId, event)),
    );
    return mergeReports(
      settled.map((result) => (result.status === 'fulfilled' ? result.value : { delivered: 0, failed: 1 })),
    );
  };

  const broadcastToRoom = (
    roomId: string,
    event: OutboundEnvelope,
    options: FanOutOptions = {},
  ): Promise<DeliveryReport> => sendToUsers(rooms.membersOf(roomId), event, options);

  const pending = new Set<Promise<void>>();

  const publish = (description: string, delivery: () => Promise<unknown>): void => {
    let started: Promise<unknown>;
    try {
      started = delivery();
    } catch (error) {
      started = Promise.reject(error);
    }

    const task: Promise<void> = started
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error({ err: error, description }, 'Fan-out failed');
      })
      .finally(() => {
        pending.delete(task);
      });
    pending.add(task);
  };

  const drain = async (): Promise<void> => {
    while (pending.size > 0) {
      await Promise.all(pending);
    }
  };

  return {
    sendToConnection,
    sendToUser,
    sendToUsers,
    broadcastToRoom,
    publish,
    drain,
    inFlight: () => pending.size,
  };
};
