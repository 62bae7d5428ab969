import { DocumentCategory } from '@hotel-concierge/shared-types';

import { DocumentChunk, NewDocumentChunk, NewHotelDocument } from '../document.types';

let sequence = 0;

export const makeChunk = (
  content: string,
  embedding: number[] | null = null,
  overrides: Partial<DocumentChunk> = {},
): DocumentChunk => {
  sequence += 1;
  return {
    id: `chunk-${sequence}`,
    documentId: 'doc-1',
    index: 0,
    content,
    charStart: 0,
    charEnd: content.length,
    pageNumber: 1,
    embedding,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
};

export const makeNewDocument = (
  title: string,
  category: DocumentCategory = 'general',
): NewHotelDocument => ({
  filename: `${title.toLowerCase().replace(/\s+/g, '-')}.txt`,
  originalFilename: `${title}.txt`,
  mimeType: 'text/plain',
  fileSize: 128,
  category,
  title,
  description: null,
  contentText: null,
  pages: [],
  uploadedBy: 'front-desk',
});

/** Stored chunk drafts in index order, one per entry. */
export const draftsFor = (
  entries: Array<{ content: string; embedding?: number[] | null }>,
): NewDocumentChunk[] =>
  entries.map((entry, index) => ({
    index,
    content: entry.content,
    charStart: 0,
    charEnd: entry.content.length,
    pageNumber: 1,
    embedding: entry.embedding ?? null,
  }));
