import { describe, expect, it } from 'vitest';
import { distanceMeters } from '../location/geo.js';
import { createGeofenceTracker } from '../location/geofences.js';
import { createLocationShareRegistry } from '../location/shares.js';
import { createGeofence } from './helpers/memoryStores.js';

const HOME = { latitude: 52.52, longitude: 13.405 };
// ~0.001 degrees of latitude is roughly 111 metres.
const NEARBY = { latitude: 52.5205, longitude: 13.405 };
const FAR = { latitude: 52.53, longitude: 13.405 };

describe('distanceMeters', () => {
  it('is zero for identical points', () => {
    expect(distanceMeters(HOME, HOME)).toBe(0);
  });

  it('matches one degree of latitude on the meridian', () => {
    const distance = distanceMeters({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 });
    expect(distance).toBeCloseTo(111_195, 0);
  });

  it('is symmetric', () => {
    expect(distanceMeters(HOME, FAR)).toBeCloseTo(distanceMeters(FAR, HOME), 6);
  });
});

describe('geofence tracker', () => {
  const geofence = createGeofence({ id: 'home', userId: 'alice', radiusMeters: 100 });

  it('emits enter when first seen inside with no history', () => {
    const tracker = createGeofenceTracker();
    const transitions = tracker.evaluate('alice', [geofence], NEARBY);
    expect(transitions.map((transition) => transition.eventType)).toEqual(['enter']);
  });

  it('records an initial outside position silently', () => {
    const tracker = createGeofenceTracker();
    expect(tracker.evaluate('alice', [geofence], FAR)).toEqual([]);
    expect(tracker.evaluate('alice', [geofence], FAR)).toEqual([]);
  });

  it('emits one event per boundary crossing', () => {
    const tracker = createGeofenceTracker();
    const events = [FAR, HOME, NEARBY, FAR, FAR, HOME].flatMap((point) =>
      tracker.evaluate('alice', [geofence], point).map((transition) => transition.eventType),
    );
    expect(events).toEqual(['enter', 'exit', 'enter']);
  });

  it('seeds state from the last persisted event', () => {
    const tracker = createGeofenceTracker();
    const seededInside = { ...geofence, lastEventType: 'enter' as const };

    expect(tracker.evaluate('alice', [seededInside], HOME)).toEqual([]);
    expect(
      tracker.evaluate('alice', [seededInside], FAR).map((transition) => transition.eventType),
    ).toEqual(['exit']);
  });

  it('forgets a user', () => {
    const tracker = createGeofenceTracker();
    tracker.evaluate('alice', [geofence], HOME);
    tracker.forget('alice');
    expect(tracker.evaluate('alice', [geofence], HOME)).toHaveLength(1);
  });
});

describe('location share registry', () => {
  const createClock = () => {
    let current = new Date('2026-05-01T10:00:00.000Z').getTime();
    return {
      now: () => new Date(current),
      advanceMinutes: (minutes: number) => {
        current += minutes * 60_000;
      },
    };
  };

  it('computes expiry from the requested duration', () => {
    const clock = createClock();
    const shares = createLocationShareRegistry({ now: clock.now, generateId: () => 'share-1' });

    const share = shares.start({ userId: 'alice', targetUserId: 'bob', durationMinutes: 90 });

    expect(share).toEqual({
      id: 'share-1',
      userId: 'alice',
      targetUserId: 'bob',
      startedAt: new Date('2026-05-01T10:00:00.000Z'),
      expiresAt: new Date('2026-05-01T11:30:00.000Z'),
    });
    expect(shares.activeSharesOf('alice')).toEqual([share]);
  });

  it('prunes expired shares lazily', () => {
    const clock = createClock();
    const shares = createLocationShareRegistry({ now: clock.now });
    const share = shares.start({ userId: 'alice', targetUserId: null, durationMinutes: 15 });

    clock.advanceMinutes(15);

    expect(shares.activeSharesOf('alice')).toEqual([]);
    expect(shares.get(share.id)).toBeUndefined();
  });

  it('only lets the owner stop a share', () => {
    const shares = createLocationShareRegistry();
    const share = shares.start({ userId: 'alice', targetUserId: 'bob', durationMinutes: 5 });

    expect(shares.stop(share.id, 'bob')).toBeNull();
    expect(shares.stop(share.id, 'alice')).toEqual(share);
    expect(shares.stop(share.id, 'alice')).toBeNull();
  });
});
