// @module: shared-ws-outbound
// @tags: websocket, schema, events
import type { RealtimeEnvelope } from './envelope.js';
import type {
  ChatMembershipBroadcast,
  ChatMessagePayload,
  MessageDeletedBroadcast,
  MessageReadBroadcast,
  TypingIndicatorBroadcast,
} from './chat.js';
import type {
  CallAnsweredBroadcast,
  CallDeclinedBroadcast,
  CallEndedBroadcast,
  CallInitiatedSuccess,
  CallParticipantBroadcast,
  IncomingCallBroadcast,
} from './call.js';
import type {
  GeofenceEventBroadcast,
  LocationShareEvent,
  LocationUpdated,
  SharedLocationUpdate,
} from './location.js';
import type { ConnectionEstablished, Pong, RealtimeError, UserStatus } from './system.js';

/** Payload carried by each server-to-client event type. */
export interface OutboundEventMap {
  connection_established: ConnectionEstablished;
  chat_joined: { chat_id: string };
  chat_left: { chat_id: string };
  user_joined_chat: ChatMembershipBroadcast;
  user_left_chat: ChatMembershipBroadcast;
  typing_indicator: TypingIndicatorBroadcast;
  message_read: MessageReadBroadcast;
  new_message: ChatMessagePayload;
  message_updated: ChatMessagePayload;
  message_deleted: MessageDeletedBroadcast;
  user_status: UserStatus;
  incoming_call: IncomingCallBroadcast;
  call_initiated_success: CallInitiatedSuccess;
  call_answered: CallAnsweredBroadcast;
  call_declined: CallDeclinedBroadcast;
  call_ended: CallEndedBroadcast;
  call_participant_joined: CallParticipantBroadcast;
  call_participant_left: CallParticipantBroadcast;
  location_updated: LocationUpdated;
  shared_location_update: SharedLocationUpdate;
  location_share_started: LocationShareEvent;
  location_share_stopped: LocationShareEvent;
  geofence_event: GeofenceEventBroadcast;
  pong: Pong;
  error: RealtimeError;
}

export type OutboundEventType = keyof OutboundEventMap;

export type OutboundEnvelope = {
  [Type in OutboundEventType]: RealtimeEnvelope<Type, OutboundEventMap[Type]>;
}[OutboundEventType];

export const createOutboundEvent = <Type extends OutboundEventType>(
  type: Type,
  data: OutboundEventMap[Type],
): RealtimeEnvelope<Type, OutboundEventMap[Type]> => Object.freeze({ type, data });
