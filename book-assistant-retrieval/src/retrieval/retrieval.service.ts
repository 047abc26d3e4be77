/**
 * Retrieval Service
 * Resolves request defaults from configuration and runs the workflow.
 */

import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RetrievalWorkflowService } from './workflow/retrieval-workflow.service';
import type { RetrievalParams } from './workflow/state/retrieval-state';
import { CorpusService } from './services/corpus.service';
import type { QueryRequestDto } from './dto/query-request.dto';
import type { RetrievalResultDto } from './dto/retrieval-result.dto';
import type { BookCatalog } from './types';
import { UnsupportedEmbeddingModelError } from './errors';

export interface CorpusReloadResult {
  chunkCount: number;
  bookCount: number;
}

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);
  private readonly defaults: RetrievalParams;

  constructor(
    private readonly configService: ConfigService,
    private readonly workflowService: RetrievalWorkflowService,
    private readonly corpusService: CorpusService,
  ) {
    this.defaults = {
      similarityThreshold: parseFloat(
        this.configService.get<string>('SIMILARITY_THRESHOLD') ?? '0.4',
      ),
      filterLimit: parseInt(
        this.configService.get<string>('FILTER_LIMIT') ?? '15',
        10,
      ),
      maxSimilarityDelta: parseFloat(
        this.configService.get<string>('MAX_SIMILARITY_DELTA') ?? '0.1',
      ),
    };

    this.logger.log(
      `Retrieval defaults: threshold=${this.defaults.similarityThreshold} ` +
        `limit=${this.defaults.filterLimit} delta=${this.defaults.maxSimilarityDelta}`,
    );
  }

  async query(request: QueryRequestDto): Promise<RetrievalResultDto> {
    return this.workflowService.executeWorkflow({
      query: request.query,
      history: request.history,
      filters: request.filters,
      mode: request.mode,
      params: {
        similarityThreshold:
          request.similarityThreshold ?? this.defaults.similarityThreshold,
        filterLimit: request.filterLimit ?? this.defaults.filterLimit,
        maxSimilarityDelta:
          request.maxSimilarityDelta ?? this.defaults.maxSimilarityDelta,
      },
      modelId: this.resolveModelId(request.embeddingModel),
    });
  }

  private resolveModelId(requested: string | undefined): string {
    try {
      return this.workflowService.resolveModelId(requested);
    } catch (error) {
      if (error instanceof UnsupportedEmbeddingModelError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  getCatalog(): Promise<BookCatalog> {
    return this.corpusService.getCatalog();
  }

  /**
   * Rereads the corpus and catalog after the indexing service rewrote them
   */
  async reloadCorpus(): Promise<CorpusReloadResult> {
    this.corpusService.invalidate();
    const [corpus, catalog] = await Promise.all([
      this.corpusService.getCorpus(),
      this.corpusService.getCatalog(),
    ]);

    this.logger.log(
      `Corpus reloaded: ${corpus.length} chunks, ${catalog.books.length} books`,
    );
    return { chunkCount: corpus.length, bookCount: catalog.books.length };
  }
}
