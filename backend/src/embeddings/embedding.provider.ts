/** Vector length produced by every configured provider. */
export const EMBEDDING_DIMENSION = 384;

/**
 * Maps text to fixed-length vectors. A provider that cannot encode answers `null` for
 * each input instead of throwing; callers treat `null` as "no vector available".
 */
export abstract class EmbeddingProvider {
  abstract readonly name: string;

  abstract readonly available: boolean;

  abstract embed(texts: string[]): Promise<Array<number[] | null>>;
}

export class NullEmbeddingProvider extends EmbeddingProvider {
  readonly name = 'none';
  readonly available = false;

  async embed(texts: string[]): Promise<Array<number[] | null>> {
    return texts.map(() => null);
  }
}
