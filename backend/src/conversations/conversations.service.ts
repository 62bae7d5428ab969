import { Injectable, Logger } from '@nestjs/common';
import {
  ChatHistoryMessage,
  GuestProfile,
  ReplyIntent,
  SentimentLabel,
} from '@hotel-concierge/shared-types';

import { DatabaseService } from '../database/database.service';
import { ConversationHistory } from './conversation.history';

export type SenderType = 'guest' | 'ai' | 'staff';
export type ConversationStatus = 'active' | 'closed';
export type ConversationPriority = 'normal' | 'high';

export interface ConversationRecord {
  id: string;
  guestId: string | null;
  guestName: string | null;
  roomNumber: string | null;
  channel: string;
  status: ConversationStatus;
  category: string | null;
  sentiment: string | null;
  priority: ConversationPriority;
  updatedAt: Date;
}

export interface MessageMetadata {
  intent?: ReplyIntent;
  confidence?: number;
  processingTimeMs?: number;
}

interface ConversationRow {
  id: string;
  guest_id: string | null;
  guest_name: string | null;
  room_number: string | null;
  channel: string;
  status: ConversationStatus;
  category: string | null;
  sentiment: string | null;
  priority: ConversationPriority;
  updated_at: Date;
}

const CONVERSATION_COLUMNS = `id, guest_id, guest_name, room_number, channel, status, category,
  sentiment, priority, updated_at`;

export const toChatRole = (senderType: string): ChatHistoryMessage['role'] =>
  senderType === 'ai' ? 'assistant' : 'user';

const toConversation = (row: ConversationRow): ConversationRecord => ({
  id: row.id,
  guestId: row.guest_id,
  guestName: row.guest_name,
  roomNumber: row.room_number,
  channel: row.channel,
  status: row.status,
  category: row.category,
  sentiment: row.sentiment,
  priority: row.priority,
  updatedAt: row.updated_at,
});

@Injectable()
export class ConversationsService extends ConversationHistory {
  private readonly logger = new Logger(ConversationsService.name);

  constructor(private readonly databaseService: DatabaseService) {
    super();
  }

  /**
   * Returns the active conversation with `conversationId`, or opens a new one for the guest.
   */
  async ensureConversation(
    conversationId: string | undefined,
    guest: GuestProfile,
    channel = 'web',
  ): Promise<ConversationRecord> {
    if (conversationId) {
      const existing = await this.databaseService.runQuery<ConversationRow>(
        `SELECT ${CONVERSATION_COLUMNS}
         FROM public.conversations
         WHERE id = $1 AND status = 'active'`,
        [conversationId],
      );
      if (existing.rows.length > 0) {
        return toConversation(existing.rows[0]);
      }
      this.logger.debug(`Conversation ${conversationId} not active; opening a new one`);
    }

    const created = await this.databaseService.runQuery<ConversationRow>(
      `INSERT INTO public.conversations (guest_id, guest_name, room_number, channel)
       VALUES ($1, $2, $3, $4)
       RETURNING ${CONVERSATION_COLUMNS}`,
      [guest.userId ?? null, guest.name ?? null, guest.roomNumber ?? null, channel],
    );

    return toConversation(created.rows[0]);
  }

  async appendMessage(
    conversationId: string,
    senderType: SenderType,
    content: string,
    metadata: MessageMetadata = {},
  ): Promise<string> {
    const result = await this.databaseService.runQuery<{ id: string }>(
      `INSERT INTO public.messages (
        conversation_id, sender_type, content, intent, confidence, processing_time_ms
      ) VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING id`,
      [
        conversationId,
        senderType,
        content,
        metadata.intent ?? null,
        metadata.confidence ?? null,
        metadata.processingTimeMs ?? null,
      ],
    );

    return result.rows[0].id;
  }

  async recentMessages(conversationId: string, limit: number): Promise<ChatHistoryMessage[]> {
    const result = await this.databaseService.runQuery<{ sender_type: string; content: string }>(
      `SELECT sender_type, content
       FROM public.messages
       WHERE conversation_id = $1
       ORDER BY created_at DESC
       LIMIT $2`,
      [conversationId, limit],
    );

    return result.rows
      .reverse()
      .map((row) => ({ role: toChatRole(row.sender_type), content: row.content }));
  }

  async recordClassification(
    conversationId: string,
    classification: { intent: ReplyIntent; sentiment: SentimentLabel; escalate: boolean },
  ): Promise<void> {
    await this.databaseService.runQuery(
      `UPDATE public.conversations
       SET category = $2,
           sentiment = $3,
           priority = CASE WHEN $4::boolean THEN 'high' ELSE priority END,
           updated_at = NOW()
       WHERE id = $1`,
      [conversationId, classification.intent, classification.sentiment, classification.escalate],
    );
  }
}
