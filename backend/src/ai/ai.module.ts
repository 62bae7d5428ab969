import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { describeError } from '../common/errors';
import { ConversationsModule } from '../conversations/conversations.module';
import { DocumentsModule } from '../documents/documents.module';
import { RequestsModule } from '../requests/requests.module';
import { AiEngineService } from './ai-engine.service';
import { ChatController } from './chat.controller';
import { EscalationService } from './escalation.service';
import { IntentService } from './intent.service';
import { OpenAiReplyModel } from './openai-reply.model';
import { NullReplyModel, ReplyModel } from './reply.model';
import { RequestExtractorService } from './request.extractor';
import { ResponseComposer } from './response.composer';
import { ResponseGeneratorService } from './response.generator';
import { SentimentService } from './sentiment.service';

export const createReplyModel = (configService: ConfigService): ReplyModel => {
  const apiKey = configService.get<string>('OPENAI_API_KEY');
  if (!apiKey) {
    return new NullReplyModel();
  }

  try {
    const model = configService.get<string>('OPENAI_RESPONSE_MODEL') ?? 'gpt-4o-mini';
    return new OpenAiReplyModel(new OpenAI({ apiKey }), model);
  } catch (error) {
    new Logger('ReplyModel').error(`Reply model failed to initialise: ${describeError(error)}`);
    return new NullReplyModel();
  }
};

@Module({
  imports: [ConfigModule, DocumentsModule, RequestsModule, ConversationsModule],
  controllers: [ChatController],
  providers: [
    { provide: ReplyModel, useFactory: createReplyModel, inject: [ConfigService] },
    IntentService,
    SentimentService,
    EscalationService,
    RequestExtractorService,
    ResponseComposer,
    ResponseGeneratorService,
    AiEngineService,
  ],
  exports: [AiEngineService],
})
export class AiModule {}
