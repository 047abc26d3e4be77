/**
 * Query Embedding Service
 * Embeds one query per request. Only the configured models are accepted,
 * each created once and cached under its normalized `provider/model` id.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Embeddings } from '@langchain/core/embeddings';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import {
  EmbeddingFailedError,
  UnsupportedEmbeddingModelError,
} from '../errors';

@Injectable()
export class QueryEmbeddingService {
  private readonly logger = new Logger(QueryEmbeddingService.name);
  private readonly models = new Map<string, Embeddings>();
  private readonly timeoutMs: number;

  constructor(
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = parseInt(
      this.configService.get<string>('EMBEDDING_TIMEOUT_MS') ?? '30000',
      10,
    );
  }

  getDefaultModelId(): string {
    return this.embeddingProviderFactory.getDefaultModelId();
  }

  /**
   * Normalized id of the requested model, or of the default one
   *
   * @throws UnsupportedEmbeddingModelError for a model that is not configured
   */
  resolveModelId(requested?: string): string {
    if (requested === undefined) {
      return this.getDefaultModelId();
    }

    const modelId = this.embeddingProviderFactory.normalizeModelId(requested);
    const supported = this.embeddingProviderFactory.getSupportedModelIds();
    if (!supported.includes(modelId)) {
      throw new UnsupportedEmbeddingModelError(requested, supported);
    }
    return modelId;
  }

  /**
   * @throws EmbeddingFailedError on unsupported model, provider error,
   * timeout or empty vector
   */
  async embedQuery(text: string, requestedModelId: string): Promise<number[]> {
    const startTime = Date.now();
    let modelId = requestedModelId;

    try {
      modelId = this.resolveModelId(requestedModelId);
      const embedding = await this.withTimeout(
        this.getModel(modelId).embedQuery(text),
      );
      if (embedding.length === 0) {
        throw new Error('Provider returned an empty embedding');
      }

      this.logger.debug(
        `[QueryEmbedding] model=${modelId} dimensions=${embedding.length} ` +
          `duration=${Date.now() - startTime}ms`,
      );
      return embedding;
    } catch (error) {
      this.logger.error(
        `[QueryEmbedding] model=${modelId} status=failed error=${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      throw new EmbeddingFailedError(
        modelId,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private getModel(modelId: string): Embeddings {
    let model = this.models.get(modelId);
    if (!model) {
      model = this.embeddingProviderFactory.createEmbeddingModel(modelId);
      this.models.set(modelId, model);
    }
    return model;
  }

  private async withTimeout<T>(promise: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });

    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
