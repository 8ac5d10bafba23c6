// @module: server-location-geofences
// @tags: location, geofence

import type { GeofenceEventType } from '@chatwire/schemas';
import type { GeofenceRecord } from '../db/locations.js';
import { distanceMeters, type Coordinates } from './geo.js';

type GeofenceSide = 'inside' | 'outside';

export interface GeofenceTransition {
  geofence: GeofenceRecord;
  eventType: GeofenceEventType;
  distanceMeters: number;
}

export interface GeofenceTracker {
  /**
   * Compares the point against each geofence and returns the boundary
   * crossings since the previous evaluation for this user.
   */
  evaluate(userId: string, geofences: GeofenceRecord[], point: Coordinates): GeofenceTransition[];
  forget(userId: string): void;
}

const sideFromLastEvent = (eventType: GeofenceEventType | null): GeofenceSide | undefined => {
  if (eventType === 'enter') {
    return 'inside';
  }

  return eventType === 'exit' ? 'outside' : undefined;
};

export const createGeofenceTracker = (): GeofenceTracker => {
  const sidesByUser = new Map<string, Map<string, GeofenceSide>>();

  const evaluate = (
    userId: string,
    geofences: GeofenceRecord[],
    point: Coordinates,
  ): GeofenceTransition[] => {
    const previousSides = sidesByUser.get(userId) ?? new Map<string, GeofenceSide>();
    const nextSides = new Map<string, GeofenceSide>();
    const transitions: GeofenceTransition[] = [];

    for (const geofence of geofences) {
      const distance = distanceMeters(point, {
        latitude: geofence.centerLatitude,
        longitude: geofence.centerLongitude,
      });
      const side: GeofenceSide = distance <= geofence.radiusMeters ? 'inside' : 'outside';
      const previous = previousSides.get(geofence.id) ?? sideFromLastEvent(geofence.lastEventType);

      if (side === 'inside' && previous !== 'inside') {
        transitions.push({ geofence, eventType: 'enter', distanceMeters: distance });
      } else if (side === 'outside' && previous === 'inside') {
        transitions.push({ geofence, eventType: 'exit', distanceMeters: distance });
      }

      nextSides.set(geofence.id, side);
    }

    // Geofences that were deactivated drop out of the state here.
    sidesByUser.set(userId, nextSides);
    return transitions;
  };

  return {
    evaluate,
    forget: (userId) => {
      sidesByUser.delete(userId);
    },
  };
};
