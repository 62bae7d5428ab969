import { Logger } from '@nestjs/common';
import OpenAI from 'openai';

import { describeError } from '../common/errors';
import { EMBEDDING_DIMENSION, EmbeddingProvider } from './embedding.provider';

export class OpenAiEmbeddingProvider extends EmbeddingProvider {
  private readonly logger = new Logger(OpenAiEmbeddingProvider.name);
  readonly available = true;
  readonly name: string;

  constructor(
    private readonly openai: OpenAI,
    private readonly model = 'text-embedding-3-small',
  ) {
    super();
    this.name = `openai:${model}`;
  }

  async embed(texts: string[]): Promise<Array<number[] | null>> {
    if (texts.length === 0) {
      return [];
    }

    try {
      const response = await this.openai.embeddings.create({
        model: this.model,
        input: texts,
        dimensions: EMBEDDING_DIMENSION,
      });

      const vectors: Array<number[] | null> = texts.map(() => null);
      for (const item of response.data) {
        if (item.index < vectors.length && item.embedding.length === EMBEDDING_DIMENSION) {
          vectors[item.index] = item.embedding;
        }
      }
      return vectors;
    } catch (error) {
      this.logger.warn(
        `Embedding request for ${texts.length} text(s) failed: ${describeError(error)}`,
      );
      return texts.map(() => null);
    }
  }
}
