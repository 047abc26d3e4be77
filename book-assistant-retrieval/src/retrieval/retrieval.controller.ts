/**
 * Retrieval HTTP Controller
 * Query and catalog endpoints for the chat UI
 */

import {
  Controller,
  Post,
  Get,
  Body,
  HttpCode,
  ValidationPipe,
  Logger,
} from '@nestjs/common';
import { QueryRequestDto } from './dto/query-request.dto';
import type { RetrievalResultDto } from './dto/retrieval-result.dto';
import type { BookCatalog } from './types';
import { RetrievalService, type CorpusReloadResult } from './retrieval.service';

@Controller('query')
export class RetrievalController {
  private readonly logger = new Logger(RetrievalController.name);

  constructor(private readonly retrievalService: RetrievalService) {}

  /**
   * POST /query
   *
   * Request:
   * {
   *   "query": "What drives the tides?",
   *   "history": [{ "role": "user", "content": "..." }],   // optional
   *   "filters": [{ "book": "Sea Notes", "chapter": null }], // optional, any set may match
   *   "mode": "retrieval_only" | "generation",             // optional, default: generation
   *   "similarityThreshold": 0.4,
   *   "filterLimit": 15,
   *   "maxSimilarityDelta": 0.1,
   *   "embeddingModel": "ollama/bge-m3:567m"                // optional, configured models only
   * }
   *
   * Response: { "answer": string | null, "sources": [...], "metrics": {...} }
   */
  @Post()
  @HttpCode(200)
  async query(
    @Body(new ValidationPipe({ whitelist: true })) body: QueryRequestDto,
  ): Promise<RetrievalResultDto> {
    this.logger.log(`Query request: "${body.query}"`);

    const result = await this.retrievalService.query(body);

    this.logger.log(
      `Query completed: ${result.sources.length} sources, ${result.metrics.totalDuration}ms`,
    );

    return result;
  }

  /**
   * GET /query/catalog
   * Book titles and their chapters for the book/chapter selectors
   */
  @Get('catalog')
  getCatalog(): Promise<BookCatalog> {
    return this.retrievalService.getCatalog();
  }

  /**
   * POST /query/reload
   * Drops the cached corpus and catalog and reads them again
   */
  @Post('reload')
  @HttpCode(200)
  reloadCorpus(): Promise<CorpusReloadResult> {
    return this.retrievalService.reloadCorpus();
  }
}
