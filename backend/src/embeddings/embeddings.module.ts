import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { describeError } from '../common/errors';
import { EmbeddingProvider, NullEmbeddingProvider } from './embedding.provider';
import { OpenAiEmbeddingProvider } from './openai-embedding.provider';

export const createEmbeddingProvider = (configService: ConfigService): EmbeddingProvider => {
  const logger = new Logger('EmbeddingProvider');
  const apiKey = configService.get<string>('OPENAI_API_KEY');

  if (!apiKey) {
    logger.warn('OPENAI_API_KEY is not configured. Retrieval will use text matching only.');
    return new NullEmbeddingProvider();
  }

  try {
    const model = configService.get<string>('OPENAI_EMBEDDING_MODEL') ?? 'text-embedding-3-small';
    return new OpenAiEmbeddingProvider(new OpenAI({ apiKey }), model);
  } catch (error) {
    logger.error(`Embedding provider failed to initialise: ${describeError(error)}`);
    return new NullEmbeddingProvider();
  }
};

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: EmbeddingProvider,
      useFactory: createEmbeddingProvider,
      inject: [ConfigService],
    },
  ],
  exports: [EmbeddingProvider],
})
export class EmbeddingsModule {}
