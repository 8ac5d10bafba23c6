import type { UserStore } from '../../auth/store.js';
import type { UserRecord } from '../../auth/types.js';
import type { AppendMessageInput, ChatMessageRecord, ChatStore } from '../../db/chat.js';
import type { DeviceTokenRecord, DeviceTokenStore } from '../../db/devices.js';
import type {
  GeofenceEventRecord,
  GeofenceRecord,
  LocationFix,
  LocationRecord,
  LocationStore,
} from '../../db/locations.js';
import type { PushGateway, PushNotification } from '../../notifications/dispatcher.js';

export const createMemoryUserStore = (users: UserRecord[]): UserStore => ({
  async findUserById(id) {
    return users.find((user) => user.id === id) ?? null;
  },
});

export interface MemoryChatStore extends ChatStore {
  messages: Map<string, ChatMessageRecord & { deleted: boolean }>;
  reads: Array<{ chatId: string; messageId: string; userId: string; readAt: Date }>;
  failReads: boolean;
}

export const createMemoryChatStore = (
  participants: Record<string, string[]>,
  clock: () => Date = () => new Date('2026-03-01T12:00:00.000Z'),
): MemoryChatStore => {
  const messages = new Map<string, ChatMessageRecord & { deleted: boolean }>();
  const reads: MemoryChatStore['reads'] = [];
  let sequence = 0;

  const live = (chatId: string, messageId: string) => {
    const message = messages.get(messageId);
    return message && !message.deleted && message.chatId === chatId ? message : null;
  };

  const strip = ({ deleted: _deleted, ...record }: ChatMessageRecord & { deleted: boolean }) =>
    record;

  const store: MemoryChatStore = {
    messages,
    reads,
    failReads: false,
    async isParticipant(chatId, userId) {
      return participants[chatId]?.includes(userId) ?? false;
    },
    async appendMessage(input: AppendMessageInput) {
      sequence += 1;
      const record = {
        id: `msg-${sequence}`,
        chatId: input.chatId,
        senderId: input.senderId,
        content: input.content,
        messageType: input.messageType,
        replyToId: input.replyToId ?? null,
        createdAt: clock(),
        updatedAt: null,
        deleted: false,
      };
      messages.set(record.id, record);
      return strip(record);
    },
    async getMessage(chatId, messageId) {
      const message = live(chatId, messageId);
      return message ? strip(message) : null;
    },
    async updateMessageContent(messageId, content) {
      const message = messages.get(messageId);
      if (!message || message.deleted) {
        return null;
      }
      message.content = content;
      message.updatedAt = clock();
      return strip(message);
    },
    async deleteMessage(messageId) {
      const message = messages.get(messageId);
      if (!message || message.deleted) {
        return false;
      }
      message.deleted = true;
      return true;
    },
    async markMessageRead(input) {
      if (store.failReads) {
        throw new Error('database unavailable');
      }
      if (!live(input.chatId, input.messageId)) {
        return false;
      }
      reads.push(input);
      return true;
    },
    async listMessages(chatId, { since, limit }) {
      return Array.from(messages.values())
        .filter((message) => message.chatId === chatId && !message.deleted)
        .filter((message) => !since || message.createdAt > since)
        .slice(0, limit)
        .map(strip);
    },
  };

  return store;
};

export interface MemoryLocationStore extends LocationStore {
  locations: LocationRecord[];
  geofenceEvents: GeofenceEventRecord[];
  geofences: GeofenceRecord[];
  failLocations: boolean;
}

export const createGeofence = (
  overrides: Partial<GeofenceRecord> & Pick<GeofenceRecord, 'id' | 'userId'>,
): GeofenceRecord => ({
  name: 'Home',
  centerLatitude: 52.52,
  centerLongitude: 13.405,
  radiusMeters: 100,
  notifyOnEntry: true,
  notifyOnExit: false,
  lastEventType: null,
  ...overrides,
});

export const createMemoryLocationStore = (
  geofences: GeofenceRecord[] = [],
): MemoryLocationStore => {
  let sequence = 0;
  const store: MemoryLocationStore = {
    locations: [],
    geofenceEvents: [],
    geofences,
    failLocations: false,
    async recordLocation(userId: string, fix: LocationFix) {
      if (store.failLocations) {
        throw new Error('database unavailable');
      }
      sequence += 1;
      const record = { id: `loc-${sequence}`, userId, ...fix };
      store.locations.push(record);
      return record;
    },
    async listActiveGeofences(userId) {
      return store.geofences
        .filter((geofence) => geofence.userId === userId)
        .map((geofence) => {
          const last = store.geofenceEvents
            .filter((event) => event.geofenceId === geofence.id && event.userId === userId)
            .at(-1);
          return last ? { ...geofence, lastEventType: last.eventType } : geofence;
        });
    },
    async recordGeofenceEvent(input) {
      sequence += 1;
      const record = { id: `gfe-${sequence}`, ...input };
      store.geofenceEvents.push(record);
      return record;
    },
  };

  return store;
};

export const createMemoryDeviceTokenStore = (
  tokens: DeviceTokenRecord[],
): DeviceTokenStore => ({
  async listActiveTokens(userId) {
    return tokens.filter((token) => token.userId === userId);
  },
});

export interface RecordingPushGateway extends PushGateway {
  deliveries: Array<{ devices: DeviceTokenRecord[]; notification: PushNotification }>;
}

export const createRecordingPushGateway = (): RecordingPushGateway => {
  const deliveries: RecordingPushGateway['deliveries'] = [];
  return {
    deliveries,
    async deliver(devices, notification) {
      deliveries.push({ devices, notification });
    },
  };
};
