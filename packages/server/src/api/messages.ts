import type { FastifyPluginCallback } from 'fastify';
import { z } from 'zod';
import {
  chatIdSchema,
  createMessageBodySchema,
  messageIdSchema,
  listMessagesQuerySchema,
  updateMessageBodySchema,
  type ChatMessagePayload,
} from '@chatwire/schemas';
import type { TokenVerifier } from '../auth/verifier.js';
import type { ChatMessageRecord, ChatStore } from '../db/chat.js';
import type { RealtimeServer } from '../ws/connection.js';
import { createRequestAuthenticator } from './guard.js';

interface MessageRoutesOptions {
  tokenVerifier: TokenVerifier;
  chatStore: ChatStore;
  realtime: Pick<
    RealtimeServer,
    'publishNewMessage' | 'publishMessageUpdated' | 'publishMessageDeleted' | 'onlineUsersInChat'
  >;
}

const chatParamsSchema = z.object({
  chatId: chatIdSchema,
});

const messageParamsSchema = chatParamsSchema.extend({
  messageId: messageIdSchema,
});

export const toMessagePayload = (record: ChatMessageRecord): ChatMessagePayload => ({
  id: record.id,
  chat_id: record.chatId,
  sender_id: record.senderId,
  content: record.content,
  message_type: record.messageType,
  reply_to_id: record.replyToId,
  created_at: record.createdAt.toISOString(),
  updated_at: record.updatedAt?.toISOString() ?? null,
});

export const messageRoutes: FastifyPluginCallback<MessageRoutesOptions> = (
  app,
  options,
  done,
) => {
  const { tokenVerifier, chatStore, realtime } = options;
  const authenticate = createRequestAuthenticator(tokenVerifier, app.log);

  app.post('/chats/:chatId/messages', async (request, reply) => {
    const user = await authenticate(request);
    if (!user) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = chatParamsSchema.safeParse(request.params);
    const bodyResult = createMessageBodySchema.safeParse(request.body);
    if (!paramsResult.success || !bodyResult.success) {
      await reply.code(400).send({
        message: 'Invalid message payload',
        issues: [
          ...(paramsResult.success ? [] : paramsResult.error.issues),
          ...(bodyResult.success ? [] : bodyResult.error.issues),
        ],
      });
      return;
    }

    const { chatId } = paramsResult.data;
    if (!(await chatStore.isParticipant(chatId, user.id))) {
      await reply.code(403).send({ message: 'Not a participant of this chat' });
      return;
    }

    const { content, message_type: messageType, reply_to_id: replyToId } = bodyResult.data;
    if (replyToId && !(await chatStore.getMessage(chatId, replyToId))) {
      await reply.code(404).send({ message: 'Reply target not found' });
      return;
    }

    const record = await chatStore.appendMessage({
      chatId,
      senderId: user.id,
      content,
      messageType,
      replyToId,
    });
    const payload = toMessagePayload(record);
    realtime.publishNewMessage(chatId, payload, user.id);

    await reply.code(201).send(payload);
  });

  app.patch('/chats/:chatId/messages/:messageId', async (request, reply) => {
    const user = await authenticate(request);
    if (!user) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = messageParamsSchema.safeParse(request.params);
    const bodyResult = updateMessageBodySchema.safeParse(request.body);
    if (!paramsResult.success || !bodyResult.success) {
      await reply.code(400).send({
        message: 'Invalid message payload',
        issues: [
          ...(paramsResult.success ? [] : paramsResult.error.issues),
          ...(bodyResult.success ? [] : bodyResult.error.issues),
        ],
      });
      return;
    }

    const { chatId, messageId } = paramsResult.data;
    if (!(await chatStore.isParticipant(chatId, user.id))) {
      await reply.code(403).send({ message: 'Not a participant of this chat' });
      return;
    }

    const existing = await chatStore.getMessage(chatId, messageId);
    if (!existing) {
      await reply.code(404).send({ message: 'Message not found' });
      return;
    }

    if (existing.senderId !== user.id) {
      await reply.code(403).send({ message: 'Only the sender can edit this message' });
      return;
    }

    const updated = await chatStore.updateMessageContent(messageId, bodyResult.data.content);
    if (!updated) {
      await reply.code(404).send({ message: 'Message not found' });
      return;
    }

    const payload = toMessagePayload(updated);
    realtime.publishMessageUpdated(chatId, payload);
    await reply.send(payload);
  });

  app.delete('/chats/:chatId/messages/:messageId', async (request, reply) => {
    const user = await authenticate(request);
    if (!user) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = messageParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply
        .code(400)
        .send({ message: 'Invalid route parameters', issues: paramsResult.error.issues });
      return;
    }

    const { chatId, messageId } = paramsResult.data;
    if (!(await chatStore.isParticipant(chatId, user.id))) {
      await reply.code(403).send({ message: 'Not a participant of this chat' });
      return;
    }

    const existing = await chatStore.getMessage(chatId, messageId);
    if (!existing) {
      await reply.code(404).send({ message: 'Message not found' });
      return;
    }

    if (existing.senderId !== user.id) {
      await reply.code(403).send({ message: 'Only the sender can delete this message' });
      return;
    }

    if (!(await chatStore.deleteMessage(messageId))) {
      await reply.code(404).send({ message: 'Message not found' });
      return;
    }

    realtime.publishMessageDeleted(chatId, messageId);
    await reply.code(204).send();
  });

  app.get('/chats/:chatId/messages', async (request, reply) => {
    const user = await authenticate(request);
    if (!user) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = chatParamsSchema.safeParse(request.params);
    const queryResult = listMessagesQuerySchema.safeParse(request.query);
    if (!paramsResult.success || !queryResult.success) {
      await reply.code(400).send({
        message: 'Invalid query',
        issues: [
          ...(paramsResult.success ? [] : paramsResult.error.issues),
          ...(queryResult.success ? [] : queryResult.error.issues),
        ],
      });
      return;
    }

    const { chatId } = paramsResult.data;
    if (!(await chatStore.isParticipant(chatId, user.id))) {
      await reply.code(403).send({ message: 'Not a participant of this chat' });
      return;
    }

    const { since, limit } = queryResult.data;
    const records = await chatStore.listMessages(chatId, {
      since: since ? new Date(since) : undefined,
      limit,
    });

    return { messages: records.map(toMessagePayload) };
  });

  app.get('/chats/:chatId/online', async (request, reply) => {
    const user = await authenticate(request);
    if (!user) {
      await reply.code(401).send({ message: 'Authentication required' });
      return;
    }

    const paramsResult = chatParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      await reply
        .code(400)
        .send({ message: 'Invalid route parameters', issues: paramsResult.error.issues });
      return;
    }

    const { chatId } = paramsResult.data;
    if (!(await chatStore.isParticipant(chatId, user.id))) {
      await reply.code(403).send({ message: 'Not a participant of this chat' });
      return;
    }

    return { chat_id: chatId, user_ids: realtime.onlineUsersInChat(chatId) };
  });

  done();
};
