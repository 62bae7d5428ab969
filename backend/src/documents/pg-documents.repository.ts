import { Injectable } from '@nestjs/common';
import { isDocumentCategory } from '@hotel-concierge/shared-types';

import { DatabaseService } from '../database/database.service';
import {
  ChunkFilter,
  DocumentChunk,
  ExtractedText,
  HotelDocument,
  NewDocumentChunk,
  NewHotelDocument,
  PageBoundary,
} from './document.types';
import { DocumentsRepository } from './documents.repository';

interface DocumentRow {
  id: string;
  filename: string;
  original_filename: string;
  mime_type: string | null;
  file_size: number | null;
  category: string;
  title: string;
  description: string | null;
  content_text: string | null;
  pages: unknown;
  is_indexed: boolean;
  is_active: boolean;
  uploaded_by: string;
  upload_date: Date;
  last_updated: Date;
}

interface ChunkRow {
  id: string;
  document_id: string;
  chunk_index: number;
  content: string;
  page_number: number;
  start_char: number;
  end_char: number;
  embedding: unknown;
  created_at: Date;
}

const DOCUMENT_COLUMNS = `id, filename, original_filename, mime_type, file_size, category, title,
  description, content_text, pages, is_indexed, is_active, uploaded_by, upload_date, last_updated`;

const CHUNK_COLUMNS = `c.id, c.document_id, c.chunk_index, c.content, c.page_number, c.start_char,
  c.end_char, c.embedding, c.created_at`;

const isNumberArray = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'number');

const toPages = (value: unknown): PageBoundary[] => {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.flatMap((entry: unknown) => {
    if (
      !entry ||
      typeof entry !== 'object' ||
      !('pageNumber' in entry) ||
      !('charStart' in entry) ||
      !('charEnd' in entry)
    ) {
      return [];
    }
    const { pageNumber, charStart, charEnd } = entry;
    if (
      typeof pageNumber !== 'number' ||
      typeof charStart !== 'number' ||
      typeof charEnd !== 'number'
    ) {
      return [];
    }
    return [{ pageNumber, charStart, charEnd }];
  });
};

const toDocument = (row: DocumentRow): HotelDocument => ({
  id: row.id,
  filename: row.filename,
  originalFilename: row.original_filename,
  mimeType: row.mime_type,
  fileSize: row.file_size,
  category: isDocumentCategory(row.category) ? row.category : 'general',
  title: row.title,
  description: row.description,
  contentText: row.content_text,
  pages: toPages(row.pages),
  isIndexed: row.is_indexed,
  isActive: row.is_active,
  uploadedBy: row.uploaded_by,
  uploadDate: row.upload_date,
  lastUpdated: row.last_updated,
});

const toChunk = (row: ChunkRow): DocumentChunk => ({
  id: row.id,
  documentId: row.document_id,
  index: row.chunk_index,
  content: row.content,
  pageNumber: row.page_number,
  charStart: row.start_char,
  charEnd: row.end_char,
  embedding: isNumberArray(row.embedding) ? row.embedding : null,
  createdAt: row.created_at,
});

@Injectable()
export class PgDocumentsRepository extends DocumentsRepository {
  constructor(private readonly databaseService: DatabaseService) {
    super();
  }

  async createDocument(document: NewHotelDocument): Promise<HotelDocument> {
    const result = await this.databaseService.runQuery<DocumentRow>(
      `INSERT INTO public.documents (
        filename, original_filename, mime_type, file_size, category, title,
        description, content_text, pages, uploaded_by
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb, $10)
      RETURNING ${DOCUMENT_COLUMNS}`,
      [
        document.filename,
        document.originalFilename,
        document.mimeType,
        document.fileSize,
        document.category,
        document.title,
        document.description,
        document.contentText,
        JSON.stringify(document.pages),
        document.uploadedBy,
      ],
    );

    return toDocument(result.rows[0]);
  }

  async loadDocument(id: string): Promise<HotelDocument | null> {
    const result = await this.databaseService.runQuery<DocumentRow>(
      `SELECT ${DOCUMENT_COLUMNS} FROM public.documents WHERE id = $1`,
      [id],
    );

    return result.rows.length > 0 ? toDocument(result.rows[0]) : null;
  }

  async listDocuments(activeOnly: boolean): Promise<HotelDocument[]> {
    const result = await this.databaseService.runQuery<DocumentRow>(
      `SELECT ${DOCUMENT_COLUMNS}
       FROM public.documents
       WHERE ($1::boolean = false OR is_active = true)
       ORDER BY upload_date DESC`,
      [activeOnly],
    );

    return result.rows.map(toDocument);
  }

  async saveExtractedText(id: string, extracted: ExtractedText): Promise<void> {
    await this.databaseService.runQuery(
      `UPDATE public.documents
       SET content_text = $2, pages = $3::jsonb, last_updated = NOW()
       WHERE id = $1`,
      [id, extracted.text, JSON.stringify(extracted.pages)],
    );
  }

  async saveChunks(documentId: string, chunks: NewDocumentChunk[]): Promise<void> {
    await this.databaseService.transaction(async (client) => {
      await client.query('DELETE FROM public.document_chunks WHERE document_id = $1', [documentId]);

      for (const chunk of chunks) {
        await client.query(
          `INSERT INTO public.document_chunks (
            document_id, chunk_index, content, page_number, start_char, end_char, embedding
          ) VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb)`,
          [
            documentId,
            chunk.index,
            chunk.content,
            chunk.pageNumber,
            chunk.charStart,
            chunk.charEnd,
            chunk.embedding ? JSON.stringify(chunk.embedding) : null,
          ],
        );
      }

      await client.query(
        `UPDATE public.documents SET is_indexed = true, last_updated = NOW() WHERE id = $1`,
        [documentId],
      );
    });
  }

  async listChunks(documentId: string): Promise<DocumentChunk[]> {
    const result = await this.databaseService.runQuery<ChunkRow>(
      `SELECT ${CHUNK_COLUMNS}
       FROM public.document_chunks c
       WHERE c.document_id = $1
       ORDER BY c.chunk_index ASC`,
      [documentId],
    );

    return result.rows.map(toChunk);
  }

  async queryChunks(filter: ChunkFilter): Promise<DocumentChunk[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.category) {
      values.push(filter.category);
      conditions.push(`d.category = $${values.length}`);
    }
    if (filter.activeOnly) {
      conditions.push('d.is_active = true');
    }
    if (filter.hasEmbedding) {
      conditions.push('c.embedding IS NOT NULL');
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.databaseService.runQuery<ChunkRow>(
      `SELECT ${CHUNK_COLUMNS}
       FROM public.document_chunks c
       JOIN public.documents d ON d.id = c.document_id
       ${where}
       ORDER BY d.upload_date ASC, c.chunk_index ASC`,
      values,
    );

    return result.rows.map(toChunk);
  }

  async deleteDocument(id: string): Promise<boolean> {
    const result = await this.databaseService.runQuery(
      'DELETE FROM public.documents WHERE id = $1',
      [id],
    );

    return (result.rowCount ?? 0) > 0;
  }
}
