// @module: shared-ws-envelope
// @tags: websocket, schema, helpers
import { z } from 'zod';

export type RealtimeEnvelope<Type extends string = string, Data = Record<string, unknown>> = {
  type: Type;
  data: Data;
};

export const realtimeEnvelopeSchema = z.object({
  type: z.string().min(1, 'type is required'),
  data: z.record(z.string(), z.unknown()).default({}),
});

export const buildEnvelopeSchema = <Type extends string, Schema extends z.ZodTypeAny>(
  type: Type,
  dataSchema: Schema,
) =>
  z.object({
    type: z.literal(type),
    data: dataSchema,
  });

export const chatIdSchema = z.string().min(1, 'chat_id is required').max(128);
export const userIdSchema = z.string().min(1, 'user id is required').max(128);
export const messageIdSchema = z.string().min(1, 'message_id is required').max(128);
