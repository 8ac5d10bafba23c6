import { z } from 'zod';
import { buildEnvelopeSchema, chatIdSchema, messageIdSchema, userIdSchema } from './envelope.js';

export const joinChatDataSchema = z.object({
  chat_id: chatIdSchema,
});

export const leaveChatDataSchema = z.object({
  chat_id: chatIdSchema,
});

export const typingIndicatorDataSchema = z.object({
  chat_id: chatIdSchema,
  is_typing: z.boolean({ required_error: 'is_typing is required' }),
});

export const messageReadDataSchema = z.object({
  message_id: messageIdSchema,
  chat_id: chatIdSchema,
});

export const joinChatEnvelopeSchema = buildEnvelopeSchema('join_chat', joinChatDataSchema);
export const leaveChatEnvelopeSchema = buildEnvelopeSchema('leave_chat', leaveChatDataSchema);
export const typingIndicatorEnvelopeSchema = buildEnvelopeSchema(
  'typing_indicator',
  typingIndicatorDataSchema,
);
export const messageReadEnvelopeSchema = buildEnvelopeSchema(
  'message_read',
  messageReadDataSchema,
);

export const chatMembershipBroadcastSchema = z.object({
  chat_id: chatIdSchema,
  user_id: userIdSchema,
});

export const typingIndicatorBroadcastSchema = z.object({
  chat_id: chatIdSchema,
  user_id: userIdSchema,
  is_typing: z.boolean(),
});

export const messageReadBroadcastSchema = z.object({
  message_id: z.string().min(1),
  chat_id: chatIdSchema,
  user_id: userIdSchema,
  read_at: z.string().datetime(),
});

export const messageTypeSchema = z.enum(['text', 'image', 'video', 'audio', 'file', 'location', 'sticker']);

export const chatMessagePayloadSchema = z.object({
  id: z.string().min(1, 'message id required'),
  chat_id: chatIdSchema,
  sender_id: userIdSchema,
  content: z.string(),
  message_type: messageTypeSchema,
  reply_to_id: z.string().nullable(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime().nullable(),
});

export const messageDeletedBroadcastSchema = z.object({
  message_id: z.string().min(1),
  chat_id: chatIdSchema,
});

export type JoinChatData = z.infer<typeof joinChatDataSchema>;
export type LeaveChatData = z.infer<typeof leaveChatDataSchema>;
export type TypingIndicatorData = z.infer<typeof typingIndicatorDataSchema>;
export type MessageReadData = z.infer<typeof messageReadDataSchema>;
export type ChatMembershipBroadcast = z.infer<typeof chatMembershipBroadcastSchema>;
export type TypingIndicatorBroadcast = z.infer<typeof typingIndicatorBroadcastSchema>;
export type MessageReadBroadcast = z.infer<typeof messageReadBroadcastSchema>;
export type MessageType = z.infer<typeof messageTypeSchema>;
export type ChatMessagePayload = z.infer<typeof chatMessagePayloadSchema>;
export type MessageDeletedBroadcast = z.infer<typeof messageDeletedBroadcastSchema>;
