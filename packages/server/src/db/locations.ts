import { randomUUID } from 'node:crypto';
import type { Pool } from 'pg';
import type { GeofenceEventType } from '@chatwire/schemas';

export interface LocationFix {
  latitude: number;
  longitude: number;
  accuracy: number | null;
  altitude: number | null;
  speed: number | null;
  heading: number | null;
  recordedAt: Date;
}

export interface LocationRecord extends LocationFix {
  id: string;
  userId: string;
}

export interface GeofenceRecord {
  id: string;
  userId: string;
  name: string;
  centerLatitude: number;
  centerLongitude: number;
  radiusMeters: number;
  notifyOnEntry: boolean;
  notifyOnExit: boolean;
  lastEventType: GeofenceEventType | null;
}

export interface GeofenceEventRecord {
  id: string;
  geofenceId: string;
  userId: string;
  eventType: GeofenceEventType;
  latitude: number;
  longitude: number;
  occurredAt: Date;
}

export interface LocationStore {
  recordLocation(userId: string, fix: LocationFix): Promise<LocationRecord>;
  listActiveGeofences(userId: string): Promise<GeofenceRecord[]>;
  recordGeofenceEvent(
    input: Omit<GeofenceEventRecord, 'id'>,
  ): Promise<GeofenceEventRecord>;
}

const toNullableNumber = (value: number | string | null): number | null => {
  if (value === null) {
    return null;
  }

  return typeof value === 'number' ? value : Number.parseFloat(value);
};

export const createLocationStore = (pool: Pool): LocationStore => {
  const recordLocation = async (userId: string, fix: LocationFix): Promise<LocationRecord> => {
    const id = randomUUID();
    await pool.query(
      `INSERT INTO user_location
         (id, user_id, latitude, longitude, accuracy, altitude, speed, heading, recorded_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        id,
        userId,
        fix.latitude,
        fix.longitude,
        fix.accuracy,
        fix.altitude,
        fix.speed,
        fix.heading,
        fix.recordedAt,
      ],
    );

    return { id, userId, ...fix };
  };

  const listActiveGeofences = async (userId: string): Promise<GeofenceRecord[]> => {
    const result = await pool.query<{
      id: string;
      user_id: string;
      name: string;
      center_latitude: number | string;
      center_longitude: number | string;
      radius_meters: number | string;
      notify_on_entry: boolean;
      notify_on_exit: boolean;
      last_event_type: GeofenceEventType | null;
    }>(
      `SELECT ga.id, ga.user_id, ga.name, ga.center_latitude, ga.center_longitude,
              ga.radius_meters, ga.notify_on_entry, ga.notify_on_exit,
              (SELECT ge.event_type
                 FROM geofence_event ge
                WHERE ge.geofence_id = ga.id AND ge.user_id = ga.user_id
                ORDER BY ge.occurred_at DESC
                LIMIT 1) AS last_event_type
         FROM geofence_area ga
        WHERE ga.user_id = $1 AND ga.is_active`,
      [userId],
    );

    return result.rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      name: row.name,
      centerLatitude: toNullableNumber(row.center_latitude) ?? 0,
      centerLongitude: toNullableNumber(row.center_longitude) ?? 0,
      radiusMeters: toNullableNumber(row.radius_meters) ?? 0,
      notifyOnEntry: row.notify_on_entry,
      notifyOnExit: row.notify_on_exit,
      lastEventType: row.last_event_type,
    }));
  };

  const recordGeofenceEvent = async (
    input: Omit<GeofenceEventRecord, 'id'>,
  ): Promise<GeofenceEventRecord> => {
    const id = randomUUID();
    await pool.query(
      `INSERT INTO geofence_event
         (id, geofence_id, user_id, event_type, latitude, longitude, occurred_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        id,
        input.geofenceId,
        input.userId,
        input.eventType,
        input.latitude,
        input.longitude,
        input.occurredAt,
      ],
    );

    return { id, ...input };
  };

  return {
    recordLocation,
    listActiveGeofences,
    recordGeofenceEvent,
  };
};
