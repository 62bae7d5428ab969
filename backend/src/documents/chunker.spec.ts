import { ConfigService } from '@nestjs/config';

import { DocumentChunker, chunkText, locateSpan, resolvePageNumber } from './chunker';
import { PageBoundary } from './document.types';

const TWO_PAGES: PageBoundary[] = [
  { pageNumber: 1, charStart: 0, charEnd: 13 },
  { pageNumber: 2, charStart: 14, charEnd: 27 },
];

describe('chunkText', () => {
  it('returns a single chunk for text under the size threshold', () => {
    const chunks = chunkText('Check-in starts at 3pm.', []);

    expect(chunks).toEqual([
      { index: 0, content: 'Check-in starts at 3pm.', charStart: 0, charEnd: 23, pageNumber: 1 },
    ]);
  });

  it('returns no chunks for blank text', () => {
    expect(chunkText('', [])).toEqual([]);
    expect(chunkText('  \n\t ', [])).toEqual([]);
  });

  it('carries the configured number of overlap tokens into the next chunk', () => {
    const chunks = chunkText('alpha beta gamma delta', [], { chunkSize: 11, overlap: 10 });

    expect(chunks.map((chunk) => chunk.content)).toEqual([
      'alpha beta',
      'beta gamma',
      'gamma delta',
    ]);
    expect(chunks.map((chunk) => [chunk.charStart, chunk.charEnd])).toEqual([
      [0, 10],
      [6, 16],
      [11, 22],
    ]);
  });

  it('rebuilds the token stream from chunks in index order minus the overlap', () => {
    const tokens = Array.from({ length: 3000 }, (_, i) => `room${i}`);

    const chunks = chunkText(tokens.join(' '), []);

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.map((chunk) => chunk.index)).toEqual(chunks.map((_, i) => i));
    const rebuilt = chunks.flatMap((chunk, i) =>
      chunk.content.split(' ').slice(i === 0 ? 0 : 20),
    );
    expect(rebuilt).toEqual(tokens);
  });

  it('carries nothing over when the overlap rounds down to zero tokens', () => {
    const chunks = chunkText('alpha beta gamma delta', [], { chunkSize: 11, overlap: 9 });

    expect(chunks.map((chunk) => chunk.content)).toEqual(['alpha beta', 'gamma', 'delta']);
  });

  it('numbers chunks contiguously and repeats the last 20 tokens by default', () => {
    const words = Array.from({ length: 400 }, (_, i) => `word${i}`);
    const chunks = chunkText(words.join(' '), []);

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.map((chunk) => chunk.index)).toEqual(chunks.map((_, i) => i));
    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(1000);
    }

    const first = chunks[0].content.split(' ');
    const second = chunks[1].content.split(' ');
    expect(second.slice(0, 20)).toEqual(first.slice(-20));
  });

  it('locates spans across irregular whitespace', () => {
    const chunks = chunkText('Pool opens\n at  7am', []);

    expect(chunks[0]).toMatchObject({ content: 'Pool opens at 7am', charStart: 0, charEnd: 19 });
  });

  it('points repeated passages at their first occurrence', () => {
    const text = 'breakfast served daily. breakfast served daily.';
    const chunks = chunkText(text, [], { chunkSize: 24, overlap: 0 });

    expect(chunks).toHaveLength(2);
    expect(chunks[1]).toMatchObject({
      content: 'breakfast served daily.',
      charStart: 0,
      charEnd: 23,
    });
  });

  it('assigns the page that contains each chunk start', () => {
    const text = 'page one text\npage two text\n';
    const chunks = chunkText(text, TWO_PAGES, { chunkSize: 14, overlap: 0 });

    expect(chunks.map((chunk) => [chunk.content, chunk.pageNumber])).toEqual([
      ['page one text', 1],
      ['page two text', 2],
    ]);
  });
});

describe('locateSpan', () => {
  it('escapes regular expression characters in tokens', () => {
    expect(locateSpan('Rates (per night): $120', ['(per', 'night):', '$120'])).toEqual({
      start: 6,
      end: 23,
    });
  });

  it('reports -1 when the tokens are not in the text', () => {
    expect(locateSpan('late checkout', ['early', 'checkout'])).toEqual({ start: -1, end: -1 });
  });
});

describe('resolvePageNumber', () => {
  it('treats page boundaries as inclusive', () => {
    expect(resolvePageNumber(13, TWO_PAGES)).toBe(1);
    expect(resolvePageNumber(14, TWO_PAGES)).toBe(2);
  });

  it('defaults to page 1', () => {
    expect(resolvePageNumber(-1, TWO_PAGES)).toBe(1);
    expect(resolvePageNumber(5, [])).toBe(1);
  });
});

describe('DocumentChunker', () => {
  it('reads size and overlap from configuration', () => {
    const config = new ConfigService({ CHUNK_SIZE: '11', CHUNK_OVERLAP: '0' });
    const chunker = new DocumentChunker(config);

    expect(chunker.chunk('alpha beta gamma delta', []).map((chunk) => chunk.content)).toEqual([
      'alpha beta',
      'gamma',
      'delta',
    ]);
  });

  it('falls back to defaults for unusable values', () => {
    const config = new ConfigService({ CHUNK_SIZE: 'large', CHUNK_OVERLAP: '-5' });
    const chunker = new DocumentChunker(config);

    expect(chunker.chunk('alpha beta gamma delta', [])).toHaveLength(1);
  });
});
