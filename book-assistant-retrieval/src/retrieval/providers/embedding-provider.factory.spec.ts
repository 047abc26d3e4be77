import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import {
  EmbeddingProviderFactory,
  parseEmbeddingModelId,
} from './embedding-provider.factory';

describe('parseEmbeddingModelId', () => {
  it('reads the provider prefix', () => {
    expect(parseEmbeddingModelId('openai/text-embedding-3-large', 'ollama')).toEqual({
      provider: 'openai',
      model: 'text-embedding-3-large',
    });
  });

  it('runs bare model names on the fallback provider', () => {
    expect(parseEmbeddingModelId('bge-m3:567m', 'ollama')).toEqual({
      provider: 'ollama',
      model: 'bge-m3:567m',
    });
  });

  it('keeps slashes that do not follow a provider name', () => {
    expect(parseEmbeddingModelId('nomic-ai/nomic-embed-text', 'ollama')).toEqual({
      provider: 'ollama',
      model: 'nomic-ai/nomic-embed-text',
    });
  });
});

describe('EmbeddingProviderFactory', () => {
  it('names the configured provider and model as the default id', () => {
    const factory = new EmbeddingProviderFactory(
      new ConfigService({
        EMBEDDING_PROVIDER: 'openai',
        EMBEDDING_MODEL_OPENAI: 'text-embedding-3-small',
      }),
    );

    expect(factory.getDefaultModelId()).toBe('openai/text-embedding-3-small');
  });

  it('falls back to ollama for an unknown provider', () => {
    const factory = new EmbeddingProviderFactory(
      new ConfigService({ EMBEDDING_PROVIDER: 'cohere' }),
    );

    expect(factory.getDefaultModelId()).toBe('ollama/bge-m3:567m');
    expect(factory.createEmbeddingModel()).toBeInstanceOf(OllamaEmbeddings);
  });

  it('requires an API key for hosted providers', () => {
    const factory = new EmbeddingProviderFactory(new ConfigService({}));

    expect(() => factory.createEmbeddingModel('google/text-embedding-004')).toThrow(
      'GOOGLE_API_KEY is required for google embeddings',
    );
  });
});
