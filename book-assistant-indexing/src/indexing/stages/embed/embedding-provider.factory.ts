/**
 * Embedding Provider Factory
 * One embedding model per indexing run, chosen by EMBEDDING_PROVIDER
 * and `EMBEDDING_MODEL_<PROVIDER>`.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import type { EmbeddingModelRef, EmbeddingProviderName } from './types';

const DEFAULT_MODELS: Record<EmbeddingProviderName, string> = {
  ollama: 'bge-m3:567m',
  openai: 'text-embedding-3-large',
  google: 'text-embedding-004',
};

const PROVIDERS: readonly string[] = Object.keys(DEFAULT_MODELS);

function isProviderName(value: string): value is EmbeddingProviderName {
  return PROVIDERS.includes(value);
}

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * `modelId` is the value the retrieval service accepts as embeddingModel
   */
  getModelRef(): EmbeddingModelRef {
    const configured = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );
    let provider: EmbeddingProviderName = 'ollama';
    if (isProviderName(configured)) {
      provider = configured;
    } else {
      this.logger.warn(
        `Invalid embedding provider: ${configured}, defaulting to ollama`,
      );
    }

    const model = this.configService.get<string>(
      `EMBEDDING_MODEL_${provider.toUpperCase()}`,
      DEFAULT_MODELS[provider],
    );
    return { provider, model, modelId: `${provider}/${model}` };
  }

  createEmbeddingModel(): Embeddings {
    const { provider, model, modelId } = this.getModelRef();
    this.logger.log(`Creating embedding model: ${modelId}`);

    if (provider === 'ollama') {
      return new OllamaEmbeddings({
        model,
        baseUrl: this.configService.get<string>(
          'OLLAMA_BASE_URL',
          'http://localhost:11434',
        ),
      });
    }

    const keyName = provider === 'openai' ? 'OPENAI_API_KEY' : 'GOOGLE_API_KEY';
    const apiKey = this.configService.get<string>(keyName);
    if (!apiKey) {
      throw new Error(`${keyName} is required for ${provider} embeddings`);
    }

    return provider === 'openai'
      ? new OpenAIEmbeddings({ model, openAIApiKey: apiKey })
      : new GoogleGenerativeAIEmbeddings({ model, apiKey });
  }
}
