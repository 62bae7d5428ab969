import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { paramPipes } from '../common/testing/route-params';
import { NullEmbeddingProvider } from '../embeddings/embedding.provider';
import { LoggingService } from '../logging/logging.service';
import { DocumentChunker } from './chunker';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';
import { RetrievalService } from './retrieval.service';
import { InMemoryDocumentsRepository } from './testing/in-memory-documents.repository';
import { makeNewDocument } from './testing/fixtures';
import { TextExtractor } from './text.extractor';

describe('DocumentsController', () => {
  let repository: InMemoryDocumentsRepository;
  let controller: DocumentsController;

  beforeEach(() => {
    repository = new InMemoryDocumentsRepository();
    const provider = new NullEmbeddingProvider();
    const loggingService = new LoggingService(new ConfigService({ NODE_ENV: 'test' }));
    jest.spyOn(loggingService, 'logIndexing').mockImplementation(() => undefined);

    controller = new DocumentsController(
      new DocumentsService(
        repository,
        new TextExtractor(),
        new DocumentChunker(new ConfigService({})),
        provider,
        loggingService,
      ),
      new RetrievalService(repository, provider),
    );
  });

  it.each(['detail', 'content', 'reprocess', 'remove'])(
    'answers a malformed id on %s with not found',
    async (method) => {
      const pipes = paramPipes(DocumentsController, method, 'id');
      expect(pipes).toHaveLength(1);

      await expect(
        Promise.resolve(pipes[0].transform('not-a-uuid', { type: 'param', data: 'id' })),
      ).rejects.toBeInstanceOf(NotFoundException);
    },
  );

  describe('content', () => {
    it('returns the extracted text', async () => {
      const document = await repository.createDocument(makeNewDocument('House rules', 'policy'));
      await repository.saveExtractedText(document.id, {
        text: 'Quiet hours from 10pm.',
        pages: [{ pageNumber: 1, charStart: 0, charEnd: 22 }],
      });

      await expect(controller.content(document.id)).resolves.toEqual({
        content: 'Quiet hours from 10pm.',
      });
    });

    it('is not found for a document without extracted text', async () => {
      const document = await repository.createDocument(makeNewDocument('House rules', 'policy'));

      await expect(controller.content(document.id)).rejects.toBeInstanceOf(NotFoundException);
    });

    it('is not found for an unknown document', async () => {
      await expect(
        controller.content('a1b2c3d4-0000-4000-8000-000000000009'),
      ).rejects.toBeInstanceOf(NotFoundException);
    });
  });
});
