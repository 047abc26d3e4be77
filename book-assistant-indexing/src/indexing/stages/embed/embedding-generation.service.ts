/**
 * Embedding Generation Service
 * Embeds texts in fixed-size batches, a few batches at a time,
 * retrying each text with exponential backoff.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Embeddings } from '@langchain/core/embeddings';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import type { BatchResult, EmbeddingFailure } from './types';

interface EmbeddingSettings {
  batchSize: number;
  maxConcurrentBatches: number;
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs: number;
}

@Injectable()
export class EmbeddingGenerationService {
  private readonly logger = new Logger(EmbeddingGenerationService.name);
  private readonly settings: EmbeddingSettings;
  private embeddingModel: Embeddings | null = null;

  constructor(
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
    configService: ConfigService,
  ) {
    const setting = (key: string, fallback: number, min: number): number => {
      const value = Number(configService.get<string>(key));
      return Number.isFinite(value) && value >= min
        ? Math.floor(value)
        : fallback;
    };

    this.settings = {
      batchSize: setting('EMBEDDING_BATCH_SIZE', 24, 1),
      maxConcurrentBatches: setting('EMBEDDING_MAX_CONCURRENT_BATCHES', 2, 1),
      maxRetries: setting('EMBEDDING_MAX_RETRIES', 3, 1),
      retryDelayMs: setting('EMBEDDING_RETRY_DELAY_MS', 1500, 0),
      timeoutMs: setting('EMBEDDING_TIMEOUT_MS', 60000, 1),
    };
  }

  /**
   * `embeddings[i]` belongs to `texts[i]`, null when that text failed
   */
  async generateEmbeddings(texts: readonly string[]): Promise<BatchResult> {
    const startTime = Date.now();
    const { batchSize, maxConcurrentBatches } = this.settings;
    const embeddings: Array<number[] | null> = Array.from(
      { length: texts.length },
      () => null,
    );
    const failed: EmbeddingFailure[] = [];

    const batchStarts: number[] = [];
    for (let start = 0; start < texts.length; start += batchSize) {
      batchStarts.push(start);
    }

    this.logger.log(
      `Embedding ${texts.length} texts in ${batchStarts.length} batches (batch size: ${batchSize})`,
    );

    for (let i = 0; i < batchStarts.length; i += maxConcurrentBatches) {
      await Promise.all(
        batchStarts.slice(i, i + maxConcurrentBatches).map(async (start) => {
          const indices = texts
            .slice(start, start + batchSize)
            .map((_, offset) => start + offset);

          await Promise.all(
            indices.map(async (index) => {
              try {
                embeddings[index] = await this.embedWithRetry(texts[index]);
              } catch (error) {
                failed.push({
                  index,
                  error: error instanceof Error ? error.message : String(error),
                });
              }
            }),
          );
        }),
      );
    }

    failed.sort((a, b) => a.index - b.index);
    const durationMs = Date.now() - startTime;

    this.logger.log(
      `Embedding generation completed: ${texts.length - failed.length}/${texts.length} successful, ` +
        `${failed.length} failed (${durationMs}ms)`,
    );
    if (failed.length > 0) {
      this.logger.warn(`Failed texts: ${failed.map((f) => f.index).join(', ')}`);
    }

    return { embeddings, failed, durationMs };
  }

  /**
   * Created on first use so a missing API key fails the book, not the module
   */
  private getModel(): Embeddings {
    if (!this.embeddingModel) {
      this.embeddingModel = this.embeddingProviderFactory.createEmbeddingModel();
    }
    return this.embeddingModel;
  }

  private async embedWithRetry(text: string): Promise<number[]> {
    const { maxRetries, retryDelayMs, timeoutMs } = this.settings;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.embedWithTimeout(text, timeoutMs);
      } catch (error) {
        if (attempt >= maxRetries) {
          throw error;
        }
        const delay = retryDelayMs * 2 ** (attempt - 1);
        this.logger.warn(
          `Embedding attempt ${attempt}/${maxRetries} failed: ` +
            `${error instanceof Error ? error.message : String(error)}, retrying in ${delay}ms`,
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  private async embedWithTimeout(
    text: string,
    timeoutMs: number,
  ): Promise<number[]> {
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        this.getModel().embedQuery(text),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Embedding timeout after ${timeoutMs}ms`)),
            timeoutMs,
          );
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
