import { z } from 'zod';
import { buildEnvelopeSchema, userIdSchema } from './envelope.js';

export const pingDataSchema = z.object({
  timestamp: z.union([z.number(), z.string().min(1)], {
    required_error: 'timestamp is required',
  }),
});

export const pingEnvelopeSchema = buildEnvelopeSchema('ping', pingDataSchema);

export const pongSchema = pingDataSchema;

export const realtimeErrorCodeSchema = z.enum([
  'invalid_json',
  'invalid_envelope',
  'unknown_type',
  'invalid_payload',
  'not_found',
  'persistence_failed',
  'internal_error',
]);

export const realtimeErrorSchema = z.object({
  code: realtimeErrorCodeSchema,
  message: z.string(),
  issues: z.array(z.unknown()).optional(),
});

export const connectionEstablishedSchema = z.object({
  user_id: userIdSchema,
  connection_id: z.string().min(1),
});

export const userStatusSchema = z.object({
  user_id: userIdSchema,
  is_online: z.boolean(),
  last_seen: z.string().datetime().nullable(),
});

export const AUTH_FAILURE_CLOSE_CODE = 4001;

export const handshakeRejectionSchema = z.object({
  code: z.literal(AUTH_FAILURE_CLOSE_CODE),
  reason: z.string(),
});

export type PingData = z.infer<typeof pingDataSchema>;
export type Pong = z.infer<typeof pongSchema>;
export type RealtimeErrorCode = z.infer<typeof realtimeErrorCodeSchema>;
export type RealtimeError = z.infer<typeof realtimeErrorSchema>;
export type ConnectionEstablished = z.infer<typeof connectionEstablishedSchema>;
export type UserStatus = z.infer<typeof userStatusSchema>;
export type HandshakeRejection = z.infer<typeof handshakeRejectionSchema>;
