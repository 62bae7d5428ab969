import { Body, Controller, Post } from '@nestjs/common';
import { ChatReplyPayload, GuestProfile } from '@hotel-concierge/shared-types';

import { ConversationsService } from '../conversations/conversations.service';
import { AiEngineService } from './ai-engine.service';
import { ChatMessageDto } from './dto/chat-message.dto';

@Controller('chat')
export class ChatController {
  constructor(
    private readonly aiEngine: AiEngineService,
    private readonly conversationsService: ConversationsService,
  ) {}

  @Post()
  async chat(@Body() dto: ChatMessageDto): Promise<ChatReplyPayload> {
    const profile: GuestProfile = {
      userId: dto.userId,
      name: dto.guestName,
      roomNumber: dto.roomNumber,
      guestType: dto.guestType,
    };

    const conversation = await this.conversationsService.ensureConversation(
      dto.conversationId,
      profile,
    );
    const reply = await this.aiEngine.generateResponse(dto.message, {
      ...profile,
      conversationId: conversation.id,
    });

    await this.conversationsService.appendMessage(conversation.id, 'guest', dto.message);
    await this.conversationsService.appendMessage(conversation.id, 'ai', reply.response, {
      intent: reply.intent,
      confidence: reply.confidence,
      processingTimeMs: reply.processingTimeMs,
    });
    await this.conversationsService.recordClassification(conversation.id, {
      intent: reply.intent,
      sentiment: reply.sentiment,
      escalate: reply.escalate,
    });

    return {
      response: reply.response,
      conversationId: conversation.id,
      intent: reply.intent,
      sentiment: reply.sentiment,
      escalate: reply.escalate,
      requestId: reply.requestId,
      suggestedResponses: reply.suggestedResponses,
    };
  }
}
