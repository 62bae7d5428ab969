import { Injectable, Logger } from '@nestjs/common';
import {
  ChunkSummary,
  DocumentCategory,
  DocumentSummary,
  RetrievalHitPayload,
} from '@hotel-concierge/shared-types';

import { describeError } from '../common/errors';
import { EmbeddingProvider } from '../embeddings/embedding.provider';
import { DocumentChunk, HotelDocument } from './document.types';
import { DocumentsRepository } from './documents.repository';
import { ScoredChunk, matchBySubstring, rankBySimilarity } from './similarity';

export type RetrievalHit = RetrievalHitPayload;

export interface SearchOptions {
  category?: DocumentCategory;
  limit?: number;
}

const PREVIEW_LENGTH = 200;
const CONTEXT_SNIPPET_LENGTH = 300;

export const summarizeDocument = (document: HotelDocument): DocumentSummary => ({
  id: document.id,
  title: document.title,
  category: document.category,
  originalFilename: document.originalFilename,
  isIndexed: document.isIndexed,
  isActive: document.isActive,
  uploadedAt: document.uploadDate.toISOString(),
});

export const summarizeChunk = (chunk: DocumentChunk): ChunkSummary => ({
  id: chunk.id,
  documentId: chunk.documentId,
  chunkIndex: chunk.index,
  content:
    chunk.content.length > PREVIEW_LENGTH
      ? `${chunk.content.slice(0, PREVIEW_LENGTH)}...`
      : chunk.content,
  pageNumber: chunk.pageNumber,
  charStart: chunk.charStart,
  charEnd: chunk.charEnd,
});

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(
    private readonly documentsRepository: DocumentsRepository,
    private readonly embeddingProvider: EmbeddingProvider,
  ) {}

  /**
   * Semantic search over active document chunks. Falls back to a case-sensitive substring
   * match when the query cannot be embedded or no stored chunk carries a vector.
   */
  async search(query: string, options: SearchOptions = {}): Promise<RetrievalHit[]> {
    if (!query.trim()) {
      return [];
    }

    const limit = options.limit ?? 5;
    const [queryVector] = this.embeddingProvider.available
      ? await this.embeddingProvider.embed([query])
      : [null];

    let scored: ScoredChunk[] | null = null;
    if (queryVector) {
      const candidates = await this.documentsRepository.queryChunks({
        category: options.category,
        activeOnly: true,
        hasEmbedding: true,
      });
      if (candidates.length > 0) {
        scored = rankBySimilarity(queryVector, candidates, limit);
      }
    }

    if (!scored) {
      this.logger.debug(`Falling back to text match for query "${query}"`);
      const candidates = await this.documentsRepository.queryChunks({
        category: options.category,
        activeOnly: true,
      });
      scored = matchBySubstring(query, candidates, limit);
    }

    return this.attachDocuments(scored);
  }

  /**
   * Renders the top hits as a context block for replies, or `''` when nothing matched.
   */
  async buildContext(query: string, limit = 3): Promise<string> {
    try {
      const results = await this.search(query, { limit });
      if (results.length === 0) {
        return '';
      }

      let context = 'Based on hotel documents:\n\n';
      for (const result of results) {
        context += `- ${result.content.slice(0, CONTEXT_SNIPPET_LENGTH)}...\n\n`;
      }
      return context;
    } catch (error) {
      this.logger.warn(`Document context lookup failed: ${describeError(error)}`);
      return '';
    }
  }

  private async attachDocuments(scored: ScoredChunk[]): Promise<RetrievalHit[]> {
    const documents = new Map<string, HotelDocument | null>();
    const hits: RetrievalHit[] = [];

    for (const { chunk, score } of scored) {
      if (!documents.has(chunk.documentId)) {
        const loaded = await this.documentsRepository.loadDocument(chunk.documentId);
        documents.set(chunk.documentId, loaded);
      }

      const document = documents.get(chunk.documentId);
      if (!document) {
        this.logger.warn(`Chunk ${chunk.id} references missing document ${chunk.documentId}`);
        continue;
      }

      hits.push({
        chunk: summarizeChunk(chunk),
        document: summarizeDocument(document),
        score,
        content: chunk.content,
      });
    }

    return hits;
  }
}
