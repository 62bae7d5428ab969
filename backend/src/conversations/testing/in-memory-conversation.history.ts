import { ChatHistoryMessage } from '@hotel-concierge/shared-types';

import { ConversationHistory } from '../conversation.history';

export class InMemoryConversationHistory extends ConversationHistory {
  private readonly conversations = new Map<string, ChatHistoryMessage[]>();

  add(conversationId: string, ...messages: ChatHistoryMessage[]): void {
    const existing = this.conversations.get(conversationId) ?? [];
    this.conversations.set(conversationId, [...existing, ...messages]);
  }

  async recentMessages(conversationId: string, limit: number): Promise<ChatHistoryMessage[]> {
    return (this.conversations.get(conversationId) ?? []).slice(-limit);
  }
}
