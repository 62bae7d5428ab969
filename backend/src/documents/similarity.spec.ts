import {
  TEXT_MATCH_SCORE,
  cosineSimilarity,
  matchBySubstring,
  rankBySimilarity,
} from './similarity';
import { makeChunk } from './testing/fixtures';

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and symmetric', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [1, 1])).toBeCloseTo(cosineSimilarity([1, 1], [1, 0]));
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('scores zero-norm, empty and mismatched vectors as 0', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
  });
});

describe('rankBySimilarity', () => {
  it('orders by score and keeps input order for ties', () => {
    const first = makeChunk('first', [1, 0]);
    const second = makeChunk('second', [0, 1]);
    const third = makeChunk('third', [2, 0]);

    const ranked = rankBySimilarity([1, 0], [first, second, third], 5);

    expect(ranked.map((hit) => hit.chunk.content)).toEqual(['first', 'third', 'second']);
    expect(ranked[0].score).toBeCloseTo(1);
    expect(ranked[2].score).toBe(0);
  });

  it('applies the limit after sorting', () => {
    const low = makeChunk('low', [0, 1]);
    const high = makeChunk('high', [1, 0]);

    expect(rankBySimilarity([1, 0], [low, high], 1).map((hit) => hit.chunk.content)).toEqual([
      'high',
    ]);
  });

  it('scores chunks without a vector as 0', () => {
    const ranked = rankBySimilarity([1, 0], [makeChunk('bare')], 5);

    expect(ranked[0].score).toBe(0);
  });
});

describe('matchBySubstring', () => {
  it('keeps case-sensitive matches in input order with a fixed score', () => {
    const candidates = [
      makeChunk('The pool opens at 7am.'),
      makeChunk('Spa: the Pool deck is heated.'),
      makeChunk('Late checkout costs extra; pool towels at the desk.'),
    ];

    const hits = matchBySubstring('pool', candidates, 5);

    expect(hits.map((hit) => hit.chunk.content)).toEqual([
      'The pool opens at 7am.',
      'Late checkout costs extra; pool towels at the desk.',
    ]);
    expect(hits.every((hit) => hit.score === TEXT_MATCH_SCORE)).toBe(true);
  });

  it('respects the limit', () => {
    const candidates = [makeChunk('gym hours'), makeChunk('gym access')];

    expect(matchBySubstring('gym', candidates, 1)).toHaveLength(1);
  });
});
