import {
  ChunkFilter,
  DocumentChunk,
  ExtractedText,
  HotelDocument,
  NewDocumentChunk,
  NewHotelDocument,
} from './document.types';

/**
 * Persistence collaborator for documents and their derived chunks. Absent documents come
 * back as `null`; only connectivity problems throw.
 */
export abstract class DocumentsRepository {
  abstract createDocument(document: NewHotelDocument): Promise<HotelDocument>;

  abstract loadDocument(id: string): Promise<HotelDocument | null>;

  abstract listDocuments(activeOnly: boolean): Promise<HotelDocument[]>;

  abstract saveExtractedText(id: string, extracted: ExtractedText): Promise<void>;

  /** Replaces every chunk of the document and marks it indexed, all or nothing. */
  abstract saveChunks(documentId: string, chunks: NewDocumentChunk[]): Promise<void>;

  abstract listChunks(documentId: string): Promise<DocumentChunk[]>;

  abstract queryChunks(filter: ChunkFilter): Promise<DocumentChunk[]>;

  abstract deleteDocument(id: string): Promise<boolean>;
}
