import { Injectable, Logger } from '@nestjs/common';
import { DocumentCategory, DocumentSummary } from '@hotel-concierge/shared-types';
import { randomUUID } from 'crypto';

import { ExtractionFailure, describeError } from '../common/errors';
import { EmbeddingProvider } from '../embeddings/embedding.provider';
import { LoggingService } from '../logging/logging.service';
import { DocumentChunker } from './chunker';
import { DocumentChunk, ExtractedText, HotelDocument, NewDocumentChunk } from './document.types';
import { DocumentsRepository } from './documents.repository';
import { summarizeDocument } from './retrieval.service';
import { TextExtractor } from './text.extractor';

const EMBED_BATCH_SIZE = 100;

export interface UploadedDocumentFile {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export interface UploadOptions {
  category?: DocumentCategory;
  title?: string;
  description?: string;
  uploadedBy?: string;
}

export interface UploadResult {
  document: DocumentSummary;
  indexed: boolean;
  error?: string;
}

export interface DocumentDetail {
  document: HotelDocument;
  chunks: DocumentChunk[];
}

@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);

  constructor(
    private readonly documentsRepository: DocumentsRepository,
    private readonly textExtractor: TextExtractor,
    private readonly chunker: DocumentChunker,
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly loggingService: LoggingService,
  ) {}

  isAllowedFile(filename: string): boolean {
    return this.textExtractor.extensionOf(filename) !== null;
  }

  /**
   * Stores the document record, then indexes it. An extraction failure leaves the
   * document stored but unindexed; the failure is reported in the result.
   */
  async uploadDocument(
    file: UploadedDocumentFile,
    options: UploadOptions = {},
  ): Promise<UploadResult> {
    const extension = this.textExtractor.extensionOf(file.originalname);
    if (!extension) {
      throw new ExtractionFailure(`Invalid file type: ${file.originalname}`, file.originalname);
    }

    const document = await this.documentsRepository.createDocument({
      filename: `${randomUUID()}.${extension}`,
      originalFilename: file.originalname,
      mimeType: file.mimetype || null,
      fileSize: file.size,
      category: options.category ?? 'policy',
      title: options.title?.trim() || file.originalname,
      description: options.description ?? null,
      contentText: null,
      pages: [],
      uploadedBy: options.uploadedBy ?? 'admin',
    });

    try {
      const extracted = await this.textExtractor.extract(file.buffer, file.originalname);
      await this.documentsRepository.saveExtractedText(document.id, extracted);
      await this.indexDocument(document.id, extracted);
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error processing document ${document.id}: ${message}`);
      this.loggingService.logIndexing(document.id, 'failed', { error: message });
      return { document: summarizeDocument(document), indexed: false, error: message };
    }

    const stored = await this.documentsRepository.loadDocument(document.id);
    return { document: summarizeDocument(stored ?? document), indexed: true };
  }

  /**
   * Re-chunks and re-embeds the stored text. `null` when the document does not exist,
   * `false` when it has no text or indexing failed.
   */
  async reprocessDocument(documentId: string): Promise<boolean | null> {
    const document = await this.documentsRepository.loadDocument(documentId);
    if (!document) {
      return null;
    }

    if (!document.contentText) {
      this.logger.warn(`Document ${documentId} has no extracted text to reprocess`);
      return false;
    }

    try {
      await this.indexDocument(documentId, { text: document.contentText, pages: document.pages });
      return true;
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error reprocessing document ${documentId}: ${message}`);
      this.loggingService.logIndexing(documentId, 'failed', { error: message });
      return false;
    }
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const documents = await this.documentsRepository.listDocuments(true);
    return documents.map(summarizeDocument);
  }

  async getDocument(documentId: string): Promise<DocumentDetail | null> {
    const document = await this.documentsRepository.loadDocument(documentId);
    if (!document) {
      return null;
    }

    const chunks = await this.documentsRepository.listChunks(documentId);
    return { document, chunks };
  }

  async getDocumentContent(documentId: string): Promise<string | null> {
    const document = await this.documentsRepository.loadDocument(documentId);
    return document?.contentText ?? null;
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    return this.documentsRepository.deleteDocument(documentId);
  }

  private async indexDocument(documentId: string, extracted: ExtractedText): Promise<void> {
    const drafts = this.chunker.chunk(extracted.text, extracted.pages);

    const embeddings: Array<number[] | null> = [];
    if (this.embeddingProvider.available) {
      for (let offset = 0; offset < drafts.length; offset += EMBED_BATCH_SIZE) {
        const batch = drafts.slice(offset, offset + EMBED_BATCH_SIZE).map((draft) => draft.content);
        embeddings.push(...(await this.embeddingProvider.embed(batch)));
      }
    }

    const chunks: NewDocumentChunk[] = drafts.map((draft, i) => ({
      ...draft,
      embedding: embeddings[i] ?? null,
    }));

    await this.documentsRepository.saveChunks(documentId, chunks);

    const embedded = chunks.filter((chunk) => chunk.embedding !== null).length;
    this.logger.debug(
      `Indexed document ${documentId}: ${chunks.length} chunks, ${embedded} with embeddings`,
    );
    this.loggingService.logIndexing(documentId, 'indexed', {
      chunkCount: chunks.length,
      embeddedCount: embedded,
      provider: this.embeddingProvider.name,
    });
  }
}
