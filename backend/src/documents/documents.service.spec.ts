import { ConfigService } from '@nestjs/config';

import { ExtractionFailure } from '../common/errors';
import { KeyedEmbeddingProvider } from '../embeddings/testing/keyed-embedding.provider';
import { LoggingService } from '../logging/logging.service';
import { DocumentChunker } from './chunker';
import { DocumentsService, UploadedDocumentFile } from './documents.service';
import { InMemoryDocumentsRepository } from './testing/in-memory-documents.repository';
import { TextExtractor } from './text.extractor';

const textFile = (originalname: string, content: string): UploadedDocumentFile => ({
  originalname,
  mimetype: 'text/plain',
  size: Buffer.byteLength(content),
  buffer: Buffer.from(content, 'utf-8'),
});

describe('DocumentsService', () => {
  let repository: InMemoryDocumentsRepository;
  let provider: KeyedEmbeddingProvider;
  let loggingService: LoggingService;
  let logIndexing: jest.SpyInstance;

  const createService = (config: Record<string, string> = {}) =>
    new DocumentsService(
      repository,
      new TextExtractor(),
      new DocumentChunker(new ConfigService(config)),
      provider,
      loggingService,
    );

  beforeEach(() => {
    repository = new InMemoryDocumentsRepository();
    provider = new KeyedEmbeddingProvider({ 'Late checkout until noon.': [1, 0] });
    loggingService = new LoggingService(new ConfigService({ NODE_ENV: 'test' }));
    logIndexing = jest.spyOn(loggingService, 'logIndexing').mockImplementation(() => undefined);
  });

  describe('uploadDocument', () => {
    it('stores, chunks and embeds a text file', async () => {
      const service = createService();

      const result = await service.uploadDocument(
        textFile('policies.txt', 'Late checkout until noon.'),
      );

      expect(result.indexed).toBe(true);
      expect(result.error).toBeUndefined();
      expect(result.document).toMatchObject({
        title: 'policies.txt',
        category: 'policy',
        originalFilename: 'policies.txt',
        isIndexed: true,
      });

      const detail = await service.getDocument(result.document.id);
      expect(detail?.document.contentText).toBe('Late checkout until noon.');
      expect(detail?.document.filename).toMatch(/^[0-9a-f-]{36}\.txt$/);
      expect(detail?.chunks.map((chunk) => [chunk.content, chunk.embedding])).toEqual([
        ['Late checkout until noon.', [1, 0]],
      ]);
      expect(logIndexing).toHaveBeenCalledWith(result.document.id, 'indexed', {
        chunkCount: 1,
        embeddedCount: 1,
        provider: 'keyed',
      });
    });

    it('keeps the given title, category and description', async () => {
      const service = createService();

      const result = await service.uploadDocument(textFile('menu.txt', 'Soup of the day'), {
        category: 'menu',
        title: '  Room Service Menu ',
        uploadedBy: 'chef',
      });

      expect(result.document).toMatchObject({ title: 'Room Service Menu', category: 'menu' });
    });

    it('refuses unsupported file types before storing anything', async () => {
      const service = createService();

      await expect(service.uploadDocument(textFile('menu.doc', 'Soup'))).rejects.toBeInstanceOf(
        ExtractionFailure,
      );
      expect(await service.listDocuments()).toEqual([]);
    });

    it('reports a failed extraction and leaves the document unindexed', async () => {
      const service = createService();

      const result = await service.uploadDocument(textFile('blank.txt', '   '));

      expect(result).toMatchObject({
        indexed: false,
        error: 'No text could be extracted from blank.txt',
      });
      expect(result.document.isIndexed).toBe(false);
      expect(logIndexing).toHaveBeenCalledWith(result.document.id, 'failed', {
        error: 'No text could be extracted from blank.txt',
      });
    });

    it('embeds chunks in batches of 100', async () => {
      const service = createService({ CHUNK_SIZE: '5', CHUNK_OVERLAP: '0' });
      const words = Array.from({ length: 250 }, () => 'w').join(' ');

      const result = await service.uploadDocument(textFile('long.txt', words));

      expect(result.indexed).toBe(true);
      expect(provider.calls.map((batch) => batch.length)).toEqual([100, 25]);
    });

    it('stores chunks without vectors when the provider is unavailable', async () => {
      provider = new KeyedEmbeddingProvider({ 'Late checkout until noon.': [1, 0] }, false);
      const service = createService();

      const result = await service.uploadDocument(
        textFile('policies.txt', 'Late checkout until noon.'),
      );

      expect(result.indexed).toBe(true);
      expect(provider.calls).toEqual([]);
      const detail = await service.getDocument(result.document.id);
      expect(detail?.chunks.map((chunk) => chunk.embedding)).toEqual([null]);
    });
  });

  describe('reprocessDocument', () => {
    it('rebuilds the chunks from the stored text', async () => {
      const service = createService();
      const { document } = await service.uploadDocument(
        textFile('policies.txt', 'Late checkout until noon.'),
      );

      expect(await service.reprocessDocument(document.id)).toBe(true);
      expect(provider.calls).toHaveLength(2);
      expect((await service.getDocument(document.id))?.chunks).toHaveLength(1);
    });

    it('returns false when there is no stored text', async () => {
      const service = createService();
      const { document } = await service.uploadDocument(textFile('blank.txt', ''));

      expect(await service.reprocessDocument(document.id)).toBe(false);
    });

    it('returns null for an unknown document', async () => {
      expect(await createService().reprocessDocument('missing')).toBeNull();
    });
  });

  it('lists and deletes documents', async () => {
    const service = createService();
    const { document } = await service.uploadDocument(textFile('faq.txt', 'Pets welcome.'));

    expect((await service.listDocuments()).map((entry) => entry.id)).toEqual([document.id]);
    expect(await service.getDocumentContent(document.id)).toBe('Pets welcome.');
    expect(await service.deleteDocument(document.id)).toBe(true);
    expect(await service.deleteDocument(document.id)).toBe(false);
    expect(await service.getDocument(document.id)).toBeNull();
  });

  it('accepts only supported file names', () => {
    const service = createService();

    expect(service.isAllowedFile('guide.pdf')).toBe(true);
    expect(service.isAllowedFile('guide.rtf')).toBe(false);
  });
});
