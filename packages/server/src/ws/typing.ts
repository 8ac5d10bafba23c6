// @module: server-ws-typing
// @tags: websocket, typing, ephemeral

import type { FastifyBaseLogger } from 'fastify';

export type TypingChangeReason = 'signal' | 'expired' | 'disconnect' | 'left' | 'message_sent';

export interface TypingChange {
  roomId: string;
  userId: string;
  isTyping: boolean;
  reason: TypingChangeReason;
}

export interface TypingTracker {
  setTyping(
    roomId: string,
    userId: string,
    isTyping: boolean,
    reason?: TypingChangeReason,
  ): void;
  isTyping(roomId: string, userId: string): boolean;
  typingUsers(roomId: string): string[];
  /** Drops indicators older than the TTL and reports each as stopped. */
  sweep(): TypingChange[];
  clearUser(userId: string, reason?: TypingChangeReason): TypingChange[];
  indicatorCount(): number;
  start(): void;
  stop(): void;
}

export interface TypingTrackerOptions {
  ttlMs: number;
  sweepIntervalMs: number;
  /** Called synchronously with each change; delivery is the listener's concern. */
  onChange: (change: TypingChange) => void;
  logger: FastifyBaseLogger;
  now?: () => number;
}

export const createTypingTracker = ({
  ttlMs,
  sweepIntervalMs,
  onChange,
  logger,
  now = () => Date.now(),
}: TypingTrackerOptions): TypingTracker => {
  // roomId -> userId -> last "typing" signal
  const indicators = new Map<string, Map<string, number>>();
  let sweepTimer: NodeJS.Timeout | null = null;

  const isFresh = (startedAt: number, at: number): boolean => at - startedAt <= ttlMs;

  const remove = (roomId: string, userId: string): boolean => {
    const room = indicators.get(roomId);
    if (!room || !room.delete(userId)) {
      return false;
    }

    if (room.size === 0) {
      indicators.delete(roomId);
    }

    return true;
  };

  const setTyping = (
    roomId: string,
    userId: string,
    isTyping: boolean,
    reason: TypingChangeReason = 'signal',
  ): void => {
    if (isTyping) {
      let room = indicators.get(roomId);
      if (!room) {
        room = new Map();
        indicators.set(roomId, room);
      }
      room.set(userId, now());
    } else {
      remove(roomId, userId);
    }

    onChange({ roomId, userId, isTyping, reason });
  };

  const typingUsers = (roomId: string): string[] => {
    const at = now();
    return Array.from(indicators.get(roomId)?.entries() ?? [])
      .filter(([, startedAt]) => isFresh(startedAt, at))
      .map(([userId]) => userId);
  };

  const publish = (changes: TypingChange[]): TypingChange[] => {
    for (const change of changes) {
      onChange(change);
    }
    return changes;
  };

  const sweep = (): TypingChange[] => {
    const at = now();
    const expired: TypingChange[] = [];

    for (const [roomId, room] of indicators) {
      for (const [userId, startedAt] of room) {
        if (!isFresh(startedAt, at)) {
          expired.push({ roomId, userId, isTyping: false, reason: 'expired' });
        }
      }
    }

    for (const change of expired) {
      remove(change.roomId, change.userId);
    }

    if (expired.length > 0) {
      logger.debug({ count: expired.length }, 'Expired stale typing indicators');
    }

    return publish(expired);
  };

  const clearUser = (
    userId: string,
    reason: TypingChangeReason = 'disconnect',
  ): TypingChange[] => {
    const cleared: TypingChange[] = [];
    for (const roomId of Array.from(indicators.keys())) {
      if (remove(roomId, userId)) {
        cleared.push({ roomId, userId, isTyping: false, reason });
      }
    }

    return publish(cleared);
  };

  const start = (): void => {
    if (sweepTimer) {
      return;
    }

    sweepTimer = setInterval(() => {
      try {
        sweep();
      } catch (error) {
        logger.error({ err: error }, 'Typing indicator sweep failed');
      }
    }, sweepIntervalMs);
    sweepTimer.unref();
  };

  const stop = (): void => {
    if (sweepTimer) {
      clearInterval(sweepTimer);
      sweepTimer = null;
    }
  };

  return {
    setTyping,
    isTyping: (roomId, userId) => {
      const startedAt = indicators.get(roomId)?.get(userId);
      return startedAt !== undefined && isFresh(startedAt, now());
    },
    typingUsers,
    sweep,
    clearUser,
    indicatorCount: () => {
      let total = 0;
      for (const room of indicators.values()) {
        total += room.size;
      }
      return total;
    },
    start,
    stop,
  };
};
