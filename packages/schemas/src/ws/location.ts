// @module: shared-ws-location
// @tags: websocket, location, geofence, schema
import { z } from 'zod';
import { buildEnvelopeSchema, userIdSchema } from './envelope.js';

export const MAX_LOCATION_SHARE_MINUTES = 24 * 60;

export const locationUpdateDataSchema = z.object({
  latitude: z.number().min(-90, 'latitude must be >= -90').max(90, 'latitude must be <= 90'),
  longitude: z
    .number()
    .min(-180, 'longitude must be >= -180')
    .max(180, 'longitude must be <= 180'),
  accuracy: z.number().nonnegative('accuracy must be non-negative').optional(),
  altitude: z.number().optional(),
  speed: z.number().nonnegative('speed must be non-negative').optional(),
  heading: z.number().min(0).lt(360, 'heading must be below 360').optional(),
});

export const locationShareStartDataSchema = z.object({
  target_user_id: userIdSchema.optional(),
  duration_minutes: z
    .number()
    .int('duration_minutes must be an integer')
    .min(1, 'duration_minutes must be positive')
    .max(MAX_LOCATION_SHARE_MINUTES, 'duration_minutes must be 1440 or fewer'),
});

export const locationShareStopDataSchema = z.object({
  share_id: z.string().min(1, 'share_id is required').max(128),
});

export const locationUpdateEnvelopeSchema = buildEnvelopeSchema(
  'location_update',
  locationUpdateDataSchema,
);
export const locationShareStartEnvelopeSchema = buildEnvelopeSchema(
  'location_share_start',
  locationShareStartDataSchema,
);
export const locationShareStopEnvelopeSchema = buildEnvelopeSchema(
  'location_share_stop',
  locationShareStopDataSchema,
);

const locationFixSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  accuracy: z.number().nullable(),
  altitude: z.number().nullable(),
  speed: z.number().nullable(),
  heading: z.number().nullable(),
  recorded_at: z.string().datetime(),
});

export const locationUpdatedSchema = locationFixSchema.extend({
  location_id: z.string().nullable(),
});

export const sharedLocationUpdateSchema = locationFixSchema.extend({
  user_id: userIdSchema,
  share_id: z.string().min(1),
});

export const locationShareEventSchema = z.object({
  share_id: z.string().min(1),
  user_id: userIdSchema,
  target_user_id: userIdSchema.nullable(),
  expires_at: z.string().datetime(),
});

export const geofenceEventTypeSchema = z.enum(['enter', 'exit']);

export const geofenceEventBroadcastSchema = z.object({
  geofence_id: z.string().min(1),
  name: z.string(),
  event_type: geofenceEventTypeSchema,
  latitude: z.number(),
  longitude: z.number(),
  occurred_at: z.string().datetime(),
});

export type LocationUpdateData = z.infer<typeof locationUpdateDataSchema>;
export type LocationShareStartData = z.infer<typeof locationShareStartDataSchema>;
export type LocationShareStopData = z.infer<typeof locationShareStopDataSchema>;
export type LocationUpdated = z.infer<typeof locationUpdatedSchema>;
export type SharedLocationUpdate = z.infer<typeof sharedLocationUpdateSchema>;
export type LocationShareEvent = z.infer<typeof locationShareEventSchema>;
export type GeofenceEventType = z.infer<typeof geofenceEventTypeSchema>;
export type GeofenceEventBroadcast = z.infer<typeof geofenceEventBroadcastSchema>;
