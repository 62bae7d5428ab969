import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AiModule } from '../ai/ai.module';
import { ConversationsModule } from '../conversations/conversations.module';
import { DatabaseModule } from '../database/database.module';
import { DocumentsModule } from '../documents/documents.module';
import { EmbeddingsModule } from '../embeddings/embeddings.module';
import { LoggingModule } from '../logging/logging.module';
import { RequestsModule } from '../requests/requests.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    LoggingModule,
    DatabaseModule,
    EmbeddingsModule,
    DocumentsModule,
    ConversationsModule,
    RequestsModule,
    AiModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
