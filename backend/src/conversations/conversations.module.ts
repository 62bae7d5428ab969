import { Module } from '@nestjs/common';

import { DatabaseModule } from '../database/database.module';
import { ConversationHistory } from './conversation.history';
import { ConversationsService } from './conversations.service';

@Module({
  imports: [DatabaseModule],
  providers: [
    ConversationsService,
    { provide: ConversationHistory, useExisting: ConversationsService },
  ],
  exports: [ConversationsService, ConversationHistory],
})
export class ConversationsModule {}
