import { ChatHistoryMessage } from '@hotel-concierge/shared-types';

/** Read-only view of a conversation's recent turns, oldest first. */
export abstract class ConversationHistory {
  abstract recentMessages(conversationId: string, limit: number): Promise<ChatHistoryMessage[]>;
}
