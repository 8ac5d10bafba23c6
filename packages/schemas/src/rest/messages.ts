import { z } from 'zod';
import { chatMessagePayloadSchema, messageTypeSchema } from '../ws/chat.js';
import { messageIdSchema } from '../ws/envelope.js';

export const MESSAGE_CONTENT_MAX_LENGTH = 4000;

export const createMessageBodySchema = z.object({
  content: z
    .string()
    .min(1, 'content is required')
    .max(MESSAGE_CONTENT_MAX_LENGTH, 'content must be 4000 characters or fewer'),
  message_type: messageTypeSchema.default('text'),
  reply_to_id: messageIdSchema.optional(),
});

export const updateMessageBodySchema = z.object({
  content: z
    .string()
    .min(1, 'content is required')
    .max(MESSAGE_CONTENT_MAX_LENGTH, 'content must be 4000 characters or fewer'),
});

export const listMessagesQuerySchema = z.object({
  since: z.string().datetime({ message: 'since must be an ISO-8601 timestamp' }).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const messageListResponseSchema = z.object({
  messages: z.array(chatMessagePayloadSchema),
});

export const onlineUsersResponseSchema = z.object({
  chat_id: z.string(),
  user_ids: z.array(z.string()),
});

export type CreateMessageBody = z.infer<typeof createMessageBodySchema>;
export type UpdateMessageBody = z.infer<typeof updateMessageBodySchema>;
export type ListMessagesQuery = z.infer<typeof listMessagesQuerySchema>;
export type MessageListResponse = z.infer<typeof messageListResponseSchema>;
export type OnlineUsersResponse = z.infer<typeof onlineUsersResponseSchema>;
