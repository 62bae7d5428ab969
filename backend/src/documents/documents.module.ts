import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { DatabaseModule } from '../database/database.module';
import { EmbeddingsModule } from '../embeddings/embeddings.module';
import { DocumentChunker } from './chunker';
import { DocumentsController } from './documents.controller';
import { DocumentsRepository } from './documents.repository';
import { DocumentsService } from './documents.service';
import { PgDocumentsRepository } from './pg-documents.repository';
import { RetrievalService } from './retrieval.service';
import { TextExtractor } from './text.extractor';

@Module({
  imports: [ConfigModule, DatabaseModule, EmbeddingsModule],
  controllers: [DocumentsController],
  providers: [
    DocumentChunker,
    TextExtractor,
    DocumentsService,
    RetrievalService,
    { provide: DocumentsRepository, useClass: PgDocumentsRepository },
  ],
  exports: [RetrievalService, DocumentsService],
})
export class DocumentsModule {}
