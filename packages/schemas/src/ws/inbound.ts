// @module: shared-ws-inbound
// @tags: websocket, schema, protocol
import { z } from 'zod';
import {
  joinChatEnvelopeSchema,
  leaveChatEnvelopeSchema,
  messageReadEnvelopeSchema,
  typingIndicatorEnvelopeSchema,
} from './chat.js';
import {
  callAnsweredEnvelopeSchema,
  callDeclinedEnvelopeSchema,
  callEndedEnvelopeSchema,
  callInitiatedEnvelopeSchema,
  callParticipantJoinedEnvelopeSchema,
  callParticipantLeftEnvelopeSchema,
} from './call.js';
import {
  locationShareStartEnvelopeSchema,
  locationShareStopEnvelopeSchema,
  locationUpdateEnvelopeSchema,
} from './location.js';
import { pingEnvelopeSchema } from './system.js';

export const inboundMessageSchema = z.discriminatedUnion('type', [
  joinChatEnvelopeSchema,
  leaveChatEnvelopeSchema,
  typingIndicatorEnvelopeSchema,
  messageReadEnvelopeSchema,
  callInitiatedEnvelopeSchema,
  callAnsweredEnvelopeSchema,
  callDeclinedEnvelopeSchema,
  callEndedEnvelopeSchema,
  callParticipantJoinedEnvelopeSchema,
  callParticipantLeftEnvelopeSchema,
  locationUpdateEnvelopeSchema,
  locationShareStartEnvelopeSchema,
  locationShareStopEnvelopeSchema,
  pingEnvelopeSchema,
]);

export type InboundMessage = z.infer<typeof inboundMessageSchema>;
export type InboundMessageType = InboundMessage['type'];

export const INBOUND_MESSAGE_TYPES: ReadonlySet<string> = new Set<InboundMessageType>([
  'join_chat',
  'leave_chat',
  'typing_indicator',
  'message_read',
  'call_initiated',
  'call_answered',
  'call_declined',
  'call_ended',
  'call_participant_joined',
  'call_participant_left',
  'location_update',
  'location_share_start',
  'location_share_stop',
  'ping',
]);
