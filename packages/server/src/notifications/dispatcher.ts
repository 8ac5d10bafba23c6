// @module: server-notifications
// @tags: push, collaborators

import type { FastifyBaseLogger } from 'fastify';
import type { DeviceTokenRecord, DeviceTokenStore } from '../db/devices.js';

export type PushCategory =
  | 'incoming_call'
  | 'location_share_started'
  | 'geofence_enter'
  | 'geofence_exit';

export interface PushNotification {
  category: PushCategory;
  title: string;
  body: string;
  data: Record<string, string>;
}

/** Out-of-band delivery to device tokens (FCM, APNs, ...). */
export interface PushGateway {
  deliver(devices: DeviceTokenRecord[], notification: PushNotification): Promise<void>;
}

export interface NotificationDispatcher {
  notify(userId: string, notification: PushNotification): Promise<void>;
}

export const createLoggingPushGateway = (logger: FastifyBaseLogger): PushGateway => ({
  async deliver(devices, notification): Promise<void> {
    logger.info(
      {
        category: notification.category,
        deviceCount: devices.length,
        platforms: [...new Set(devices.map((device) => device.platform))],
      },
      'Handing push notification to gateway',
    );
  },
});

/**
 * Resolves a user's device tokens and hands the payload to the gateway. Errors
 * are logged and never surface to the caller.
 */
export const createNotificationDispatcher = ({
  deviceTokenStore,
  gateway,
  logger,
}: {
  deviceTokenStore: DeviceTokenStore;
  gateway: PushGateway;
  logger: FastifyBaseLogger;
}): NotificationDispatcher => ({
  async notify(userId, notification): Promise<void> {
    try {
      const devices = await deviceTokenStore.listActiveTokens(userId);
      if (devices.length === 0) {
        logger.debug({ userId, category: notification.category }, 'No device tokens for push');
        return;
      }

      await gateway.deliver(devices, notification);
    } catch (error) {
      logger.error(
        { err: error, userId, category: notification.category },
        'Failed to dispatch push notification',
      );
    }
  },
});
