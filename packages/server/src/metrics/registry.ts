import { collectDefaultMetrics, Counter, Gauge, Registry } from 'prom-client';

export interface MetricsBundle {
  registry: Registry;
  activeConnections: Gauge;
  onlineUsers: Gauge;
  inboundFrames: Counter<'type'>;
  deliveredEvents: Counter<'type'>;
  failedDeliveries: Counter<'type'>;
  typingExpirations: Counter;
}

export const createMetricsBundle = ({
  collectDefaults = true,
}: { collectDefaults?: boolean } = {}): MetricsBundle => {
  const registry = new Registry();
  if (collectDefaults) {
    collectDefaultMetrics({ register: registry });
  }

  const activeConnections = new Gauge({
    name: 'chatwire_realtime_connections',
    help: 'Number of active realtime websocket connections',
    registers: [registry],
  });

  const onlineUsers = new Gauge({
    name: 'chatwire_online_users',
    help: 'Number of users with at least one live connection',
    registers: [registry],
  });

  const inboundFrames = new Counter({
    name: 'chatwire_inbound_frames_total',
    help: 'Count of inbound frames by type, or by rejection code',
    labelNames: ['type'] as const,
    registers: [registry],
  });

  const deliveredEvents = new Counter({
    name: 'chatwire_delivered_events_total',
    help: 'Count of outbound events acknowledged by a connection',
    labelNames: ['type'] as const,
    registers: [registry],
  });

  const failedDeliveries = new Counter({
    name: 'chatwire_failed_deliveries_total',
    help: 'Count of outbound events that failed or timed out',
    labelNames: ['type'] as const,
    registers: [registry],
  });

  const typingExpirations = new Counter({
    name: 'chatwire_typing_expirations_total',
    help: 'Count of typing indicators cleared by the TTL sweep',
    registers: [registry],
  });

  return {
    registry,
    activeConnections,
    onlineUsers,
    inboundFrames,
    deliveredEvents,
    failedDeliveries,
    typingExpirations,
  };
};
