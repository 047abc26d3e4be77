import { ConfigService } from '@nestjs/config';
import { FakeEmbeddings } from '@langchain/core/utils/testing';
import { EmbeddingGenerationService } from './embedding-generation.service';
import { EmbeddingProviderFactory } from './embedding-provider.factory';

class FlakyEmbeddings extends FakeEmbeddings {
  readonly attempts = new Map<string, number>();

  async embedQuery(text: string): Promise<number[]> {
    const attempt = (this.attempts.get(text) ?? 0) + 1;
    this.attempts.set(text, attempt);
    if (text === 'always fails' || attempt === 1) {
      throw new Error(`attempt ${attempt} failed`);
    }
    return [text.length, attempt];
  }
}

describe('EmbeddingGenerationService', () => {
  const configService = new ConfigService({
    EMBEDDING_BATCH_SIZE: '2',
    EMBEDDING_MAX_CONCURRENT_BATCHES: '1',
    EMBEDDING_MAX_RETRIES: '2',
    EMBEDDING_RETRY_DELAY_MS: '0',
  });
  let model: FlakyEmbeddings;
  let service: EmbeddingGenerationService;

  beforeEach(() => {
    model = new FlakyEmbeddings();
    const factory = new EmbeddingProviderFactory(configService);
    jest.spyOn(factory, 'createEmbeddingModel').mockReturnValue(model);
    service = new EmbeddingGenerationService(factory, configService);
  });

  it('retries and keeps embeddings aligned with their texts', async () => {
    const result = await service.generateEmbeddings(['ab', 'always fails', 'abcd']);

    expect(result.embeddings).toEqual([[2, 2], null, [4, 2]]);
    expect(result.failed).toEqual([{ index: 1, error: 'attempt 2 failed' }]);
    expect(model.attempts.get('always fails')).toBe(2);
  });

  it('does nothing for an empty input', async () => {
    const result = await service.generateEmbeddings([]);

    expect(result.embeddings).toEqual([]);
    expect(result.failed).toEqual([]);
  });
});
