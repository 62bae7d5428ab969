import { randomUUID } from 'crypto';

import {
  ChunkFilter,
  DocumentChunk,
  ExtractedText,
  HotelDocument,
  NewDocumentChunk,
  NewHotelDocument,
} from '../document.types';
import { DocumentsRepository } from '../documents.repository';

/** Process-local stand-in for the Postgres repository, used by specs. */
export class InMemoryDocumentsRepository extends DocumentsRepository {
  private readonly documents = new Map<string, HotelDocument>();
  private readonly chunks = new Map<string, DocumentChunk[]>();

  async createDocument(document: NewHotelDocument): Promise<HotelDocument> {
    const now = new Date();
    const created: HotelDocument = {
      ...document,
      id: randomUUID(),
      isIndexed: false,
      isActive: true,
      uploadDate: now,
      lastUpdated: now,
    };
    this.documents.set(created.id, created);
    return created;
  }

  async loadDocument(id: string): Promise<HotelDocument | null> {
    return this.documents.get(id) ?? null;
  }

  async listDocuments(activeOnly: boolean): Promise<HotelDocument[]> {
    return [...this.documents.values()]
      .filter((document) => !activeOnly || document.isActive)
      .reverse();
  }

  async saveExtractedText(id: string, extracted: ExtractedText): Promise<void> {
    const document = this.documents.get(id);
    if (document) {
      this.documents.set(id, { ...document, contentText: extracted.text, pages: extracted.pages });
    }
  }

  async saveChunks(documentId: string, chunks: NewDocumentChunk[]): Promise<void> {
    const createdAt = new Date();
    this.chunks.set(
      documentId,
      chunks.map((chunk) => ({ ...chunk, id: randomUUID(), documentId, createdAt })),
    );

    const document = this.documents.get(documentId);
    if (document) {
      this.documents.set(documentId, { ...document, isIndexed: true });
    }
  }

  async listChunks(documentId: string): Promise<DocumentChunk[]> {
    return [...(this.chunks.get(documentId) ?? [])].sort((a, b) => a.index - b.index);
  }

  async queryChunks(filter: ChunkFilter): Promise<DocumentChunk[]> {
    const matches: DocumentChunk[] = [];
    for (const document of this.documents.values()) {
      if (filter.category && document.category !== filter.category) {
        continue;
      }
      if (filter.activeOnly && !document.isActive) {
        continue;
      }
      for (const chunk of this.chunks.get(document.id) ?? []) {
        if (!filter.hasEmbedding || chunk.embedding) {
          matches.push(chunk);
        }
      }
    }
    return matches;
  }

  async deleteDocument(id: string): Promise<boolean> {
    this.chunks.delete(id);
    return this.documents.delete(id);
  }

  deactivate(id: string): void {
    const document = this.documents.get(id);
    if (document) {
      this.documents.set(id, { ...document, isActive: false });
    }
  }
}
