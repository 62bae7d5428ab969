import { DocumentChunk } from './document.types';

export interface ScoredChunk {
  chunk: DocumentChunk;
  score: number;
}

/** Score given to every hit of the substring fallback. */
export const TEXT_MATCH_SCORE = 0.5;

export const cosineSimilarity = (a: number[], b: number[]): number => {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

/**
 * Orders candidates by cosine similarity to the query, highest first. The sort is stable,
 * so equal scores keep their input order. Candidates without a vector score 0.
 */
export const rankBySimilarity = (
  queryVector: number[],
  candidates: DocumentChunk[],
  limit: number,
): ScoredChunk[] =>
  candidates
    .map((chunk) => ({
      chunk,
      score: chunk.embedding ? cosineSimilarity(chunk.embedding, queryVector) : 0,
    }))
    .sort((left, right) => right.score - left.score)
    .slice(0, limit);

export const matchBySubstring = (
  query: string,
  candidates: DocumentChunk[],
  limit: number,
): ScoredChunk[] =>
  candidates
    .filter((chunk) => chunk.content.includes(query))
    .slice(0, limit)
    .map((chunk) => ({ chunk, score: TEXT_MATCH_SCORE }));
