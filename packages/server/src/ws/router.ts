// @module: server-ws-router
// @tags: websocket, routing

import { createOutboundEvent, type InboundMessage } from '@chatwire/schemas';
import type { ChatStore } from '../db/chat.js';
import type { LocationService } from '../location/service.js';
import type { CallSignaling } from './calls.js';
import { reply, replyError, type ConnectionContext } from './context.js';
import type { EventDispatcher } from './dispatcher.js';
import type { RoomMembershipIndex } from './roomIndex.js';
import type { TypingTracker } from './typing.js';

export interface InboundRouter {
  route(context: ConnectionContext, message: InboundMessage): Promise<void>;
}

export interface InboundRouterOptions {
  rooms: RoomMembershipIndex;
  typing: TypingTracker;
  dispatcher: EventDispatcher;
  chatStore: ChatStore;
  calls: CallSignaling;
  locations: LocationService;
  now?: () => Date;
}

export const createInboundRouter = ({
  rooms,
  typing,
  dispatcher,
  chatStore,
  calls,
  locations,
  now = () => new Date(),
}: InboundRouterOptions): InboundRouter => {
  const joinChat = async (context: ConnectionContext, chatId: string): Promise<void> => {
    const userId = context.user.id;
    const joined = rooms.join(chatId, userId);
    context.logger.debug({ chatId, joined }, 'Joined chat room');

    await reply(dispatcher, context, createOutboundEvent('chat_joined', { chat_id: chatId }));
    if (joined) {
      dispatcher.publish('user_joined_chat', () =>
        dispatcher.broadcastToRoom(
          chatId,
          createOutboundEvent('user_joined_chat', { chat_id: chatId, user_id: userId }),
          { excludeUserId: userId },
        ),
      );
    }
  };

  const leaveChat = async (context: ConnectionContext, chatId: string): Promise<void> => {
    const userId = context.user.id;
    if (typing.isTyping(chatId, userId)) {
      typing.setTyping(chatId, userId, false, 'left');
    }

    const left = rooms.leave(chatId, userId);
    context.logger.debug({ chatId, left }, 'Left chat room');

    await reply(dispatcher, context, createOutboundEvent('chat_left', { chat_id: chatId }));
    if (left) {
      dispatcher.publish('user_left_chat', () =>
        dispatcher.broadcastToRoom(
          chatId,
          createOutboundEvent('user_left_chat', { chat_id: chatId, user_id: userId }),
        ),
      );
    }
  };

  const markRead = async (
    context: ConnectionContext,
    chatId: string,
    messageId: string,
  ): Promise<void> => {
    const userId = context.user.id;
    const readAt = now();

    let marked: boolean;
    try {
      marked = await chatStore.markMessageRead({ chatId, messageId, userId, readAt });
    } catch (error) {
      context.logger.error({ err: error, chatId, messageId }, 'Failed to persist read receipt');
      await replyError(dispatcher, context, 'persistence_failed', 'Read receipt could not be saved');
      return;
    }

    if (!marked) {
      await replyError(dispatcher, context, 'not_found', `Message ${messageId} not found`);
      return;
    }

    dispatcher.publish('message_read', () =>
      dispatcher.broadcastToRoom(
        chatId,
        createOutboundEvent('message_read', {
          message_id: messageId,
          chat_id: chatId,
          user_id: userId,
          read_at: readAt.toISOString(),
        }),
        { excludeUserId: userId },
      ),
    );
  };

  const route = async (context: ConnectionContext, message: InboundMessage): Promise<void> => {
    switch (message.type) {
      case 'join_chat':
        return joinChat(context, message.data.chat_id);
      case 'leave_chat':
        return leaveChat(context, message.data.chat_id);
      case 'typing_indicator':
        typing.setTyping(message.data.chat_id, context.user.id, message.data.is_typing);
        return;
      case 'message_read':
        return markRead(context, message.data.chat_id, message.data.message_id);
      case 'call_initiated':
        return calls.initiated(context, message.data);
      case 'call_answered':
        return calls.answered(context, message.data);
      case 'call_declined':
        return calls.declined(context, message.data);
      case 'call_ended':
        return calls.ended(context, message.data);
      case 'call_participant_joined':
      case 'call_participant_left':
        return calls.participantChanged(context, message.type, message.data);
      case 'location_update':
        return locations.handleUpdate(context, message.data);
      case 'location_share_start':
        return locations.startShare(context, message.data);
      case 'location_share_stop':
        return locations.stopShare(context, message.data);
      case 'ping':
        await reply(
          dispatcher,
          context,
          createOutboundEvent('pong', { timestamp: message.data.timestamp }),
        );
        return;
      default: {
        const unhandled: never = message;
        throw new Error(`Unhandled inbound message: ${JSON.stringify(unhandled)}`);
      }
    }
  };

  return { route };
};
