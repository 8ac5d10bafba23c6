// @module: server-ws-presence
// @tags: websocket, presence

import { createOutboundEvent, type UserStatus } from '@chatwire/schemas';
import type { DeliveryReport, EventDispatcher } from './dispatcher.js';
import type { RoomMembershipIndex } from './roomIndex.js';
import type { SessionRegistry } from './sessionRegistry.js';

export interface PresenceNotifier {
  statusOf(userId: string): UserStatus;
  /** Status as of a registry transition, captured before anything else can change it. */
  snapshot(userId: string, isOnline: boolean, lastSeen: Date): UserStatus;
  /** Sends a status to everyone sharing a room with the user. */
  announce(status: UserStatus): Promise<DeliveryReport>;
  onlineMembers(roomId: string): string[];
}

export const createPresenceNotifier = ({
  registry,
  rooms,
  dispatcher,
}: {
  registry: SessionRegistry;
  rooms: RoomMembershipIndex;
  dispatcher: EventDispatcher;
}): PresenceNotifier => {
  const statusOf = (userId: string): UserStatus => ({
    user_id: userId,
    is_online: registry.isOnline(userId),
    last_seen: registry.lastSeen(userId)?.toISOString() ?? null,
  });

  return {
    statusOf,
    snapshot: (userId, isOnline, lastSeen) => ({
      user_id: userId,
      is_online: isOnline,
      last_seen: lastSeen.toISOString(),
    }),
    announce: (status) =>
      dispatcher.sendToUsers(rooms.peersOf(status.user_id), createOutboundEvent('user_status', status), {
        excludeUserId: status.user_id,
      }),
    onlineMembers: (roomId) =>
      rooms.membersOf(roomId).filter((userId) => registry.isOnline(userId)),
  };
};
