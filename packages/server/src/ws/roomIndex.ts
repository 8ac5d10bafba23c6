// @module: server-ws-rooms
// @tags: websocket, membership

export interface RoomMembershipIndex {
  /** Returns true when the user was not already a member. */
  join(roomId: string, userId: string): boolean;
  /** Returns true when the user was a member. */
  leave(roomId: string, userId: string): boolean;
  isMember(roomId: string, userId: string): boolean;
  membersOf(roomId: string): string[];
  roomsContaining(userId: string): string[];
  /** Every user sharing at least one room with `userId`, excluding them. */
  peersOf(userId: string): Set<string>;
  roomCount(): number;
  clear(): void;
}

export const createRoomMembershipIndex = (): RoomMembershipIndex => {
  const membersByRoom = new Map<string, Set<string>>();
  const roomsByUser = new Map<string, Set<string>>();

  const addTo = (index: Map<string, Set<string>>, key: string, value: string): boolean => {
    let bucket = index.get(key);
    if (!bucket) {
      bucket = new Set();
      index.set(key, bucket);
    }

    if (bucket.has(value)) {
      return false;
    }

    bucket.add(value);
    return true;
  };

  const removeFrom = (index: Map<string, Set<string>>, key: string, value: string): boolean => {
    const bucket = index.get(key);
    if (!bucket || !bucket.delete(value)) {
      return false;
    }

    if (bucket.size === 0) {
      index.delete(key);
    }

    return true;
  };

  const join = (roomId: string, userId: string): boolean => {
    const added = addTo(membersByRoom, roomId, userId);
    addTo(roomsByUser, userId, roomId);
    return added;
  };

  const leave = (roomId: string, userId: string): boolean => {
    const removed = removeFrom(membersByRoom, roomId, userId);
    removeFrom(roomsByUser, userId, roomId);
    return removed;
  };

  const membersOf = (roomId: string): string[] => Array.from(membersByRoom.get(roomId) ?? []);

  const roomsContaining = (userId: string): string[] => Array.from(roomsByUser.get(userId) ?? []);

  const peersOf = (userId: string): Set<string> => {
    const peers = new Set<string>();
    for (const roomId of roomsByUser.get(userId) ?? []) {
      for (const memberId of membersByRoom.get(roomId) ?? []) {
        if (memberId !== userId) {
          peers.add(memberId);
        }
      }
    }

    return peers;
  };

  return {
    join,
    leave,
    isMember: (roomId, userId) => membersByRoom.get(roomId)?.has(userId) ?? false,
    membersOf,
    roomsContaining,
    peersOf,
    roomCount: () => membersByRoom.size,
    clear: () => {
      membersByRoom.clear();
      roomsByUser.clear();
    },
  };
};
