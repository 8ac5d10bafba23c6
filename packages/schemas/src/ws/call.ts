// @module: shared-ws-call
// @tags: websocket, calls, signaling, schema
import { z } from 'zod';
import { buildEnvelopeSchema, userIdSchema } from './envelope.js';

export const callIdSchema = z.union([
  z.string().min(1, 'call_id is required').max(128),
  z.number().int().nonnegative(),
]);

export const callTypeSchema = z.enum(['audio', 'video']);

const channelNameSchema = z.string().min(1, 'channel_name is required').max(256);
const participantsSchema = z.array(userIdSchema).max(64, 'participants must list 64 users or fewer');

export const callInitiatedDataSchema = z.object({
  call_id: callIdSchema,
  callee_id: userIdSchema,
  call_type: callTypeSchema.default('video'),
  channel_name: channelNameSchema,
});

export const callAnsweredDataSchema = z.object({
  call_id: callIdSchema,
  caller_id: userIdSchema,
  accepted: z.boolean({ required_error: 'accepted is required' }),
  channel_name: channelNameSchema,
});

export const callDeclinedDataSchema = z.object({
  call_id: callIdSchema,
  caller_id: userIdSchema,
});

export const callEndedDataSchema = z.object({
  call_id: callIdSchema,
  participants: participantsSchema,
  end_reason: z.string().min(1).max(64).default('user_ended'),
});

export const callParticipantChangeDataSchema = z.object({
  call_id: callIdSchema,
  participants: participantsSchema,
  participant_name: z.string().min(1).max(128).default('Unknown'),
});

export const callInitiatedEnvelopeSchema = buildEnvelopeSchema(
  'call_initiated',
  callInitiatedDataSchema,
);
export const callAnsweredEnvelopeSchema = buildEnvelopeSchema(
  'call_answered',
  callAnsweredDataSchema,
);
export const callDeclinedEnvelopeSchema = buildEnvelopeSchema(
  'call_declined',
  callDeclinedDataSchema,
);
export const callEndedEnvelopeSchema = buildEnvelopeSchema('call_ended', callEndedDataSchema);
export const callParticipantJoinedEnvelopeSchema = buildEnvelopeSchema(
  'call_participant_joined',
  callParticipantChangeDataSchema,
);
export const callParticipantLeftEnvelopeSchema = buildEnvelopeSchema(
  'call_participant_left',
  callParticipantChangeDataSchema,
);

export const incomingCallBroadcastSchema = z.object({
  call_id: callIdSchema,
  caller_id: userIdSchema,
  call_type: callTypeSchema,
  channel_name: channelNameSchema,
});

export const callInitiatedSuccessSchema = z.object({
  call_id: callIdSchema,
  channel_name: channelNameSchema,
});

export const callAnsweredBroadcastSchema = z.object({
  call_id: callIdSchema,
  callee_id: userIdSchema,
  channel_name: channelNameSchema,
});

export const callDeclinedBroadcastSchema = z.object({
  call_id: callIdSchema,
  callee_id: userIdSchema,
});

export const callEndedBroadcastSchema = z.object({
  call_id: callIdSchema,
  ended_by: userIdSchema,
  end_reason: z.string(),
});

export const callParticipantBroadcastSchema = z.object({
  call_id: callIdSchema,
  participant_id: userIdSchema,
  participant_name: z.string(),
});

export type CallId = z.infer<typeof callIdSchema>;
export type CallType = z.infer<typeof callTypeSchema>;
export type CallInitiatedData = z.infer<typeof callInitiatedDataSchema>;
export type CallAnsweredData = z.infer<typeof callAnsweredDataSchema>;
export type CallDeclinedData = z.infer<typeof callDeclinedDataSchema>;
export type CallEndedData = z.infer<typeof callEndedDataSchema>;
export type CallParticipantChangeData = z.infer<typeof callParticipantChangeDataSchema>;
export type IncomingCallBroadcast = z.infer<typeof incomingCallBroadcastSchema>;
export type CallInitiatedSuccess = z.infer<typeof callInitiatedSuccessSchema>;
export type CallAnsweredBroadcast = z.infer<typeof callAnsweredBroadcastSchema>;
export type CallDeclinedBroadcast = z.infer<typeof callDeclinedBroadcastSchema>;
export type CallEndedBroadcast = z.infer<typeof callEndedBroadcastSchema>;
export type CallParticipantBroadcast = z.infer<typeof callParticipantBroadcastSchema>;
