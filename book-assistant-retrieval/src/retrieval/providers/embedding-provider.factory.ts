/**
 * Embedding Provider Factory
 *
 * Embedding models are addressed by id: `provider/model`
 * (`openai/text-embedding-3-large`) or a bare model name that runs on the
 * configured EMBEDDING_PROVIDER. Queries must be embedded with the model that
 * embedded the corpus.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  isEmbeddingProvider,
  type EmbeddingModelRef,
  type EmbeddingProvider,
} from './types';

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'bge-m3:567m',
  openai: 'text-embedding-3-large',
  google: 'text-embedding-004',
};

export function parseEmbeddingModelId(
  modelId: string,
  fallbackProvider: EmbeddingProvider,
): EmbeddingModelRef {
  const separator = modelId.indexOf('/');
  if (separator > 0) {
    const prefix = modelId.slice(0, separator);
    const model = modelId.slice(separator + 1);
    if (isEmbeddingProvider(prefix) && model.length > 0) {
      return { provider: prefix, model };
    }
  }
  // Ollama model names may contain "/" themselves
  return { provider: fallbackProvider, model: modelId };
}

export function formatEmbeddingModelId(ref: EmbeddingModelRef): string {
  return `${ref.provider}/${ref.model}`;
}

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Model id the corpus is expected to be embedded with
   */
  getDefaultModelId(): string {
    const provider = this.getProvider();
    return formatEmbeddingModelId({ provider, model: this.getModel(provider) });
  }

  /**
   * `bge-m3:567m` and `ollama/bge-m3:567m` name the same model
   */
  normalizeModelId(modelId: string): string {
    return formatEmbeddingModelId(
      parseEmbeddingModelId(modelId, this.getProvider()),
    );
  }

  /**
   * One configured model per provider
   */
  getSupportedModelIds(): string[] {
    return Object.keys(DEFAULT_EMBEDDING_MODELS)
      .filter(isEmbeddingProvider)
      .map((provider) =>
        formatEmbeddingModelId({ provider, model: this.getModel(provider) }),
      );
  }

  createEmbeddingModel(modelId: string = this.getDefaultModelId()): Embeddings {
    const { provider, model } = parseEmbeddingModelId(
      modelId,
      this.getProvider(),
    );

    this.logger.log(`Creating embedding model: ${provider}/${model}`);

    switch (provider) {
      case 'ollama':
        return new OllamaEmbeddings({
          model,
          baseUrl: this.configService.get<string>(
            'OLLAMA_BASE_URL',
            'http://localhost:11434',
          ),
        });
      case 'openai':
        return new OpenAIEmbeddings({
          model,
          openAIApiKey: this.requireApiKey('OPENAI_API_KEY', provider),
        });
      case 'google':
        return new GoogleGenerativeAIEmbeddings({
          model,
          apiKey: this.requireApiKey('GOOGLE_API_KEY', provider),
        });
    }
  }

  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );

    if (!isEmbeddingProvider(provider)) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to ollama`,
      );
      return 'ollama';
    }

    return provider;
  }

  private getModel(provider: EmbeddingProvider): string {
    return this.configService.get<string>(
      `EMBEDDING_MODEL_${provider.toUpperCase()}`,
      DEFAULT_EMBEDDING_MODELS[provider],
    );
  }

  private requireApiKey(key: string, provider: EmbeddingProvider): string {
    const apiKey = this.configService.get<string>(key);
    if (!apiKey) {
      throw new Error(`${key} is required for ${provider} embeddings`);
    }
    return apiKey;
  }
}
