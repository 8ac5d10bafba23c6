// @module: server-location-shares
// @tags: location, sharing

import { randomUUID } from 'node:crypto';

export interface LocationShare {
  id: string;
  userId: string;
  targetUserId: string | null;
  startedAt: Date;
  expiresAt: Date;
}

export interface LocationShareRegistry {
  start(input: { userId: string; targetUserId: string | null; durationMinutes: number }): LocationShare;
  /** Only the owner may stop a share; returns null otherwise. */
  stop(shareId: string, userId: string): LocationShare | null;
  activeSharesOf(userId: string): LocationShare[];
  get(shareId: string): LocationShare | undefined;
  clear(): void;
}

export const createLocationShareRegistry = ({
  now = () => new Date(),
  generateId = randomUUID,
}: {
  now?: () => Date;
  generateId?: () => string;
} = {}): LocationShareRegistry => {
  const shares = new Map<string, LocationShare>();
  const sharesByUser = new Map<string, Set<string>>();

  const drop = (share: LocationShare): void => {
    shares.delete(share.id);
    const owned = sharesByUser.get(share.userId);
    owned?.delete(share.id);
    if (owned && owned.size === 0) {
      sharesByUser.delete(share.userId);
    }
  };

  const isExpired = (share: LocationShare, at: Date): boolean =>
    share.expiresAt.getTime() <= at.getTime();

  const get = (shareId: string): LocationShare | undefined => {
    const share = shares.get(shareId);
    if (share && isExpired(share, now())) {
      drop(share);
      return undefined;
    }

    return share;
  };

  const start = ({
    userId,
    targetUserId,
    durationMinutes,
  }: {
    userId: string;
    targetUserId: string | null;
    durationMinutes: number;
  }): LocationShare => {
    const startedAt = now();
    const share: LocationShare = {
      id: generateId(),
      userId,
      targetUserId,
      startedAt,
      expiresAt: new Date(startedAt.getTime() + durationMinutes * 60_000),
    };

    shares.set(share.id, share);
    let owned = sharesByUser.get(userId);
    if (!owned) {
      owned = new Set();
      sharesByUser.set(userId, owned);
    }
    owned.add(share.id);

    return share;
  };

  const stop = (shareId: string, userId: string): LocationShare | null => {
    const share = get(shareId);
    if (!share || share.userId !== userId) {
      return null;
    }

    drop(share);
    return share;
  };

  const activeSharesOf = (userId: string): LocationShare[] => {
    const at = now();
    const active: LocationShare[] = [];
    for (const shareId of Array.from(sharesByUser.get(userId) ?? [])) {
      const share = shares.get(shareId);
      if (!share) {
        continue;
      }

      if (isExpired(share, at)) {
        drop(share);
      } else {
        active.push(share);
      }
    }

    return active;
  };

  return {
    start,
    stop,
    activeSharesOf,
    get,
    clear: () => {
      shares.clear();
      sharesByUser.clear();
    },
  };
};
