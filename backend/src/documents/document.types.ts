import { DocumentCategory } from '@hotel-concierge/shared-types';

export interface PageBoundary {
  pageNumber: number;
  charStart: number;
  charEnd: number;
}

export interface HotelDocument {
  id: string;
  filename: string;
  originalFilename: string;
  mimeType: string | null;
  fileSize: number | null;
  category: DocumentCategory;
  title: string;
  description: string | null;
  contentText: string | null;
  pages: PageBoundary[];
  isIndexed: boolean;
  isActive: boolean;
  uploadedBy: string;
  uploadDate: Date;
  lastUpdated: Date;
}

export type NewHotelDocument = Omit<
  HotelDocument,
  'id' | 'isIndexed' | 'isActive' | 'uploadDate' | 'lastUpdated'
>;

/** Chunker output, before it is stored against a document. */
export interface ChunkDraft {
  index: number;
  content: string;
  charStart: number;
  charEnd: number;
  pageNumber: number;
}

export interface NewDocumentChunk extends ChunkDraft {
  embedding: number[] | null;
}

export interface DocumentChunk extends NewDocumentChunk {
  id: string;
  documentId: string;
  createdAt: Date;
}

export interface ChunkFilter {
  category?: DocumentCategory;
  activeOnly: boolean;
  hasEmbedding?: boolean;
}

export interface ExtractedText {
  text: string;
  pages: PageBoundary[];
}
