import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { ChunkDraft, PageBoundary } from './document.types';

export interface ChunkOptions {
  /** Upper bound on a chunk's length in characters (tokens + joining spaces). */
  chunkSize: number;
  /** Overlap in characters; carried over as `floor(overlap / 10)` tokens. */
  overlap: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = { chunkSize: 1000, overlap: 200 };

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Finds the first place `tokens` appear in `text`, allowing any whitespace run between
 * them. Identical phrasing earlier in the document wins, even when the chunk really came
 * from a later passage.
 */
export const locateSpan = (text: string, tokens: string[]): { start: number; end: number } => {
  const pattern = new RegExp(tokens.map(escapeRegExp).join('\\s+'));
  const match = pattern.exec(text);
  if (!match) {
    return { start: -1, end: -1 };
  }

  return { start: match.index, end: match.index + match[0].length };
};

export const resolvePageNumber = (charStart: number, pages: PageBoundary[]): number => {
  const page = pages.find((entry) => charStart >= entry.charStart && charStart <= entry.charEnd);
  return page?.pageNumber ?? 1;
};

/**
 * Splits extracted text into overlapping, page-aware chunks. Pure: the same input always
 * yields the same drafts.
 */
export const chunkText = (
  text: string,
  pages: PageBoundary[],
  options: ChunkOptions = DEFAULT_CHUNK_OPTIONS,
): ChunkDraft[] => {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const overlapTokens = Math.floor(options.overlap / 10);
  const drafts: ChunkDraft[] = [];

  const emit = (tokens: string[]) => {
    const span = locateSpan(text, tokens);
    drafts.push({
      index: drafts.length,
      content: tokens.join(' '),
      charStart: span.start,
      charEnd: span.end,
      pageNumber: resolvePageNumber(span.start, pages),
    });
  };

  let current: string[] = [];
  let currentLength = 0;

  for (const word of words) {
    if (currentLength + word.length + 1 > options.chunkSize && current.length > 0) {
      emit(current);

      const carried =
        overlapTokens > 0 && current.length > overlapTokens ? current.slice(-overlapTokens) : [];
      current = [...carried, word];
      currentLength = current.reduce((total, token) => total + token.length + 1, 0);
    } else {
      current.push(word);
      currentLength += word.length + 1;
    }
  }

  if (current.length > 0) {
    emit(current);
  }

  return drafts;
};

@Injectable()
export class DocumentChunker {
  private readonly options: ChunkOptions;

  constructor(private readonly configService: ConfigService) {
    this.options = {
      chunkSize: this.readNonNegativeInt('CHUNK_SIZE', DEFAULT_CHUNK_OPTIONS.chunkSize),
      overlap: this.readNonNegativeInt('CHUNK_OVERLAP', DEFAULT_CHUNK_OPTIONS.overlap),
    };
  }

  chunk(text: string, pages: PageBoundary[]): ChunkDraft[] {
    return chunkText(text, pages, this.options);
  }

  private readNonNegativeInt(key: string, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    const parsed = typeof raw === 'number' ? raw : Number.parseInt(raw ?? '', 10);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
  }
}
