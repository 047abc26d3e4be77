/**
 * Embed Stage
 * Attaches a dense embedding of its text to every corpus record.
 * Records that still fail after retries are left out of the corpus.
 */

import { Injectable, Logger } from '@nestjs/common';
import type { EmbeddedChunk } from '../../types/corpus.types';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { EmbeddingGenerationService } from './embedding-generation.service';
import { EmbeddingFailedError } from './errors';
import type { EmbedInputDto, EmbedOutputDto } from './types';

@Injectable()
export class EmbedStage {
  private readonly logger = new Logger(EmbedStage.name);

  constructor(
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
    private readonly embeddingGenerationService: EmbeddingGenerationService,
  ) {}

  async execute(input: EmbedInputDto): Promise<EmbedOutputDto> {
    const { provider, model, modelId } =
      this.embeddingProviderFactory.getModelRef();

    this.logger.log(
      `[Embed Stage] Starting for "${input.bookTitle}" ` +
        `(${input.records.length} records, ${modelId})`,
    );

    const result = await this.embeddingGenerationService.generateEmbeddings(
      input.records.map((record) => record.text),
    );

    // Corpus order follows record order, not completion order
    const chunks: EmbeddedChunk[] = [];
    input.records.forEach((record, index) => {
      const embedding = result.embeddings[index];
      if (embedding) {
        chunks.push({ ...record, embedding });
      }
    });

    if (input.records.length > 0 && chunks.length === 0) {
      throw new EmbeddingFailedError(
        input.bookTitle,
        result.failed.length,
        result.failed[0]?.error ?? 'Unknown error',
      );
    }

    this.logger.log(
      `[Embed Stage] Completed for "${input.bookTitle}": ` +
        `${chunks.length}/${input.records.length} embedded in ${result.durationMs}ms`,
    );

    return {
      chunks,
      metadata: {
        provider,
        model,
        modelId,
        dimensions: chunks[0]?.embedding.length ?? 0,
        totalRecords: input.records.length,
        embeddedCount: chunks.length,
        failedCount: result.failed.length,
        durationMs: result.durationMs,
      },
    };
  }
}
