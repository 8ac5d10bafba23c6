// @module: server-location-service
// @tags: location, sharing, geofence, websocket

import {
  createOutboundEvent,
  type LocationShareEvent,
  type LocationShareStartData,
  type LocationShareStopData,
  type LocationUpdateData,
} from '@chatwire/schemas';
import type { FastifyBaseLogger } from 'fastify';
import type { GeofenceRecord, LocationFix, LocationStore } from '../db/locations.js';
import type { NotificationDispatcher } from '../notifications/dispatcher.js';
import { reply, replyError, type ConnectionContext } from '../ws/context.js';
import type { EventDispatcher } from '../ws/dispatcher.js';
import type { RoomMembershipIndex } from '../ws/roomIndex.js';
import type { SessionRegistry } from '../ws/sessionRegistry.js';
import type { GeofenceTracker, GeofenceTransition } from './geofences.js';
import type { LocationShare, LocationShareRegistry } from './shares.js';

export interface LocationService {
  handleUpdate(context: ConnectionContext, data: LocationUpdateData): Promise<void>;
  startShare(context: ConnectionContext, data: LocationShareStartData): Promise<void>;
  stopShare(context: ConnectionContext, data: LocationShareStopData): Promise<void>;
}

export interface LocationServiceOptions {
  dispatcher: EventDispatcher;
  rooms: RoomMembershipIndex;
  registry: SessionRegistry;
  locationStore: LocationStore;
  notifications: NotificationDispatcher;
  shares: LocationShareRegistry;
  geofences: GeofenceTracker;
  logger: FastifyBaseLogger;
  now?: () => Date;
}

const toShareEvent = (share: LocationShare): LocationShareEvent => ({
  share_id: share.id,
  user_id: share.userId,
  target_user_id: share.targetUserId,
  expires_at: share.expiresAt.toISOString(),
});

const LOW_ACCURACY_METERS = 100;

const describeDuration = (minutes: number): string =>
  minutes % 60 === 0 ? `${minutes / 60}h` : `${minutes}m`;

export const createLocationService = ({
  dispatcher,
  rooms,
  registry,
  locationStore,
  notifications,
  shares,
  geofences,
  logger,
  now = () => new Date(),
}: LocationServiceOptions): LocationService => {
  const shareRecipients = (share: LocationShare): Set<string> =>
    share.targetUserId ? new Set([share.targetUserId]) : rooms.peersOf(share.userId);

  const fanOutToShares = (userId: string, fix: LocationFix): void => {
    for (const share of shares.activeSharesOf(userId)) {
      dispatcher.publish('shared_location_update', () =>
        dispatcher.sendToUsers(
          shareRecipients(share),
          createOutboundEvent('shared_location_update', {
            user_id: userId,
            share_id: share.id,
            latitude: fix.latitude,
            longitude: fix.longitude,
            accuracy: fix.accuracy,
            altitude: fix.altitude,
            speed: fix.speed,
            heading: fix.heading,
            recorded_at: fix.recordedAt.toISOString(),
          }),
          { excludeUserId: userId },
        ),
      );
    }
  };

  const publishTransition = async (
    userId: string,
    fix: LocationFix,
    { geofence, eventType }: GeofenceTransition,
  ): Promise<void> => {
    try {
      await locationStore.recordGeofenceEvent({
        geofenceId: geofence.id,
        userId,
        eventType,
        latitude: fix.latitude,
        longitude: fix.longitude,
        occurredAt: fix.recordedAt,
      });
    } catch (error) {
      logger.error({ err: error, geofenceId: geofence.id, userId }, 'Failed to persist geofence event');
    }

    dispatcher.publish('geofence_event', () =>
      dispatcher.sendToUser(
        userId,
        createOutboundEvent('geofence_event', {
          geofence_id: geofence.id,
          name: geofence.name,
          event_type: eventType,
          latitude: fix.latitude,
          longitude: fix.longitude,
          occurred_at: fix.recordedAt.toISOString(),
        }),
      ),
    );

    const shouldNotify = eventType === 'enter' ? geofence.notifyOnEntry : geofence.notifyOnExit;
    if (shouldNotify) {
      dispatcher.publish('geofence_push', () =>
        notifications.notify(userId, {
          category: eventType === 'enter' ? 'geofence_enter' : 'geofence_exit',
          title: eventType === 'enter' ? `Arrived at ${geofence.name}` : `Left ${geofence.name}`,
          body: `You ${eventType === 'enter' ? 'entered' : 'left'} ${geofence.name}`,
          data: { geofence_id: geofence.id, event_type: eventType },
        }),
      );
    }
  };

  const checkGeofences = async (userId: string, fix: LocationFix): Promise<void> => {
    let active: GeofenceRecord[];
    try {
      active = await locationStore.listActiveGeofences(userId);
    } catch (error) {
      logger.error({ err: error, userId }, 'Failed to load geofences');
      return;
    }

    const transitions = geofences.evaluate(userId, active, fix);
    for (const transition of transitions) {
      await publishTransition(userId, fix, transition);
    }
  };

  const handleUpdate = async (
    context: ConnectionContext,
    data: LocationUpdateData,
  ): Promise<void> => {
    const userId = context.user.id;
    const fix: LocationFix = {
      latitude: data.latitude,
      longitude: data.longitude,
      accuracy: data.accuracy ?? null,
      altitude: data.altitude ?? null,
      speed: data.speed ?? null,
      heading: data.heading ?? null,
      recordedAt: now(),
    };

    if (fix.accuracy !== null && fix.accuracy > LOW_ACCURACY_METERS) {
      context.logger.debug({ accuracy: fix.accuracy }, 'Low accuracy location update');
    }

    let locationId: string | null = null;
    try {
      const record = await locationStore.recordLocation(userId, fix);
      locationId = record.id;
    } catch (error) {
      context.logger.error({ err: error }, 'Failed to persist location update');
      await replyError(dispatcher, context, 'persistence_failed', 'Location could not be saved');
    }

    await reply(
      dispatcher,
      context,
      createOutboundEvent('location_updated', {
        location_id: locationId,
        latitude: fix.latitude,
        longitude: fix.longitude,
        accuracy: fix.accuracy,
        altitude: fix.altitude,
        speed: fix.speed,
        heading: fix.heading,
        recorded_at: fix.recordedAt.toISOString(),
      }),
    );

    fanOutToShares(userId, fix);
    await checkGeofences(userId, fix);
  };

  const startShare = async (
    context: ConnectionContext,
    data: LocationShareStartData,
  ): Promise<void> => {
    const share = shares.start({
      userId: context.user.id,
      targetUserId: data.target_user_id ?? null,
      durationMinutes: data.duration_minutes,
    });
    const event = createOutboundEvent('location_share_started', toShareEvent(share));

    context.logger.info(
      { shareId: share.id, targetUserId: share.targetUserId, expiresAt: share.expiresAt },
      'Location share started',
    );

    await reply(dispatcher, context, event);
    dispatcher.publish(event.type, () =>
      dispatcher.sendToUsers(shareRecipients(share), event, { excludeUserId: share.userId }),
    );

    const { targetUserId } = share;
    if (targetUserId && !registry.isOnline(targetUserId)) {
      dispatcher.publish('location_share_push', () =>
        notifications.notify(targetUserId, {
          category: 'location_share_started',
          title: 'Location shared with you',
          body: `${context.user.username ?? 'Someone'} is sharing their location for ${describeDuration(data.duration_minutes)}`,
          data: { share_id: share.id, user_id: share.userId },
        }),
      );
    }
  };

  const stopShare = async (
    context: ConnectionContext,
    data: LocationShareStopData,
  ): Promise<void> => {
    const share = shares.stop(data.share_id, context.user.id);
    if (!share) {
      await replyError(dispatcher, context, 'not_found', `Location share ${data.share_id} not found`);
      return;
    }

    const event = createOutboundEvent('location_share_stopped', toShareEvent(share));
    await reply(dispatcher, context, event);
    dispatcher.publish(event.type, () =>
      dispatcher.sendToUsers(shareRecipients(share), event, { excludeUserId: share.userId }),
    );
  };

  return {
    handleUpdate,
    startShare,
    stopShare,
  };
};
