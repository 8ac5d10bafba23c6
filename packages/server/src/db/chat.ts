import { randomUUID } from 'node:crypto';
import type { Pool } from 'pg';
import type { MessageType } from '@chatwire/schemas';

export interface ChatMessageRecord {
  id: string;
  chatId: string;
  senderId: string;
  content: string;
  messageType: MessageType;
  replyToId: string | null;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface AppendMessageInput {
  chatId: string;
  senderId: string;
  content: string;
  messageType: MessageType;
  replyToId?: string;
}

export interface ChatStore {
  isParticipant(chatId: string, userId: string): Promise<boolean>;
  appendMessage(input: AppendMessageInput): Promise<ChatMessageRecord>;
  getMessage(chatId: string, messageId: string): Promise<ChatMessageRecord | null>;
  updateMessageContent(messageId: string, content: string): Promise<ChatMessageRecord | null>;
  deleteMessage(messageId: string): Promise<boolean>;
  markMessageRead(input: {
    chatId: string;
    messageId: string;
    userId: string;
    readAt: Date;
  }): Promise<boolean>;
  listMessages(
    chatId: string,
    options: { since?: Date; limit: number },
  ): Promise<ChatMessageRecord[]>;
}

interface ChatMessageRow {
  id: string;
  chat_id: string;
  sender_id: string;
  content: string;
  message_type: MessageType;
  reply_to_id: string | null;
  created_at: Date;
  updated_at: Date | null;
}

const MESSAGE_COLUMNS =
  'id, chat_id, sender_id, content, message_type, reply_to_id, created_at, updated_at';

const mapRow = (row: ChatMessageRow): ChatMessageRecord => ({
  id: row.id,
  chatId: row.chat_id,
  senderId: row.sender_id,
  content: row.content,
  messageType: row.message_type,
  replyToId: row.reply_to_id,
  createdAt: new Date(row.created_at),
  updatedAt: row.updated_at ? new Date(row.updated_at) : null,
});

export const createChatStore = (pool: Pool): ChatStore => {
  const isParticipant = async (chatId: string, userId: string): Promise<boolean> => {
    const result = await pool.query<{ user_id: string }>(
      `SELECT user_id
         FROM chat_participant
        WHERE chat_id = $1 AND user_id = $2 AND left_at IS NULL
        LIMIT 1`,
      [chatId, userId],
    );
    return (result.rowCount ?? 0) > 0;
  };

  const appendMessage = async ({
    chatId,
    senderId,
    content,
    messageType,
    replyToId,
  }: AppendMessageInput): Promise<ChatMessageRecord> => {
    const result = await pool.query<ChatMessageRow>(
      `INSERT INTO chat_message (id, chat_id, sender_id, content, message_type, reply_to_id)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${MESSAGE_COLUMNS}`,
      [randomUUID(), chatId, senderId, content, messageType, replyToId ?? null],
    );

    return mapRow(result.rows[0]);
  };

  const getMessage = async (
    chatId: string,
    messageId: string,
  ): Promise<ChatMessageRecord | null> => {
    const result = await pool.query<ChatMessageRow>(
      `SELECT ${MESSAGE_COLUMNS}
         FROM chat_message
        WHERE id = $1 AND chat_id = $2 AND NOT is_deleted
        LIMIT 1`,
      [messageId, chatId],
    );
    return result.rowCount === 0 ? null : mapRow(result.rows[0]);
  };

  const updateMessageContent = async (
    messageId: string,
    content: string,
  ): Promise<ChatMessageRecord | null> => {
    const result = await pool.query<ChatMessageRow>(
      `UPDATE chat_message
          SET content = $2, updated_at = now()
        WHERE id = $1 AND NOT is_deleted
        RETURNING ${MESSAGE_COLUMNS}`,
      [messageId, content],
    );
    return result.rowCount === 0 ? null : mapRow(result.rows[0]);
  };

  const deleteMessage = async (messageId: string): Promise<boolean> => {
    const result = await pool.query(
      `UPDATE chat_message
          SET is_deleted = true, updated_at = now()
        WHERE id = $1 AND NOT is_deleted`,
      [messageId],
    );
    return (result.rowCount ?? 0) > 0;
  };

  const markMessageRead = async ({
    chatId,
    messageId,
    userId,
    readAt,
  }: {
    chatId: string;
    messageId: string;
    userId: string;
    readAt: Date;
  }): Promise<boolean> => {
    const updated = await pool.query(
      `UPDATE chat_message
          SET status = 'read'
        WHERE id = $1 AND chat_id = $2 AND NOT is_deleted`,
      [messageId, chatId],
    );
    if ((updated.rowCount ?? 0) === 0) {
      return false;
    }

    await pool.query(
      `INSERT INTO message_read_receipt (message_id, user_id, read_at)
         VALUES ($1, $2, $3)
         ON CONFLICT (message_id, user_id) DO NOTHING`,
      [messageId, userId, readAt],
    );
    return true;
  };

  const listMessages = async (
    chatId: string,
    { since, limit }: { since?: Date; limit: number },
  ): Promise<ChatMessageRecord[]> => {
    const result = await pool.query<ChatMessageRow>(
      `SELECT ${MESSAGE_COLUMNS}
         FROM chat_message
        WHERE chat_id = $1
          AND NOT is_deleted
          AND ($2::timestamptz IS NULL OR created_at > $2 OR updated_at > $2)
        ORDER BY created_at ASC, id ASC
        LIMIT $3`,
      [chatId, since ?? null, limit],
    );

    return result.rows.map((row) => mapRow(row));
  };

  return {
    isParticipant,
    appendMessage,
    getMessage,
    updateMessageContent,
    deleteMessage,
    markMessageRead,
    listMessages,
  };
};
