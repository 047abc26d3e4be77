/**
 * Similarity Retriever
 *
 * Scores every chunk against the query embedding, then applies, in order:
 * threshold, stable descending sort, delta window below the top score, limit.
 */

import { Injectable, Logger } from '@nestjs/common';
import type { EmbeddedChunk, ScoredChunk } from '../types';
import {
  EmbeddingDimensionMismatchError,
  EmbeddingFailedError,
  InvalidRetrievalParamsError,
} from '../errors';
import { cosineSimilarity } from './similarity';

export type EmbedFunction = (text: string, modelId: string) => Promise<number[]>;

export interface RetrieveParams {
  corpus: readonly EmbeddedChunk[];
  query: string;
  similarityThreshold: number;
  filterLimit: number;
  maxSimilarityDelta: number;
  embed: EmbedFunction;
  modelId: string;
}

function validateParams(params: RetrieveParams): void {
  if (!Number.isInteger(params.filterLimit) || params.filterLimit < 1) {
    throw new InvalidRetrievalParamsError(
      `filterLimit must be a positive integer, got ${params.filterLimit}`,
    );
  }
  if (!(params.maxSimilarityDelta >= 0)) {
    throw new InvalidRetrievalParamsError(
      `maxSimilarityDelta must be >= 0, got ${params.maxSimilarityDelta}`,
    );
  }
  if (Number.isNaN(params.similarityThreshold)) {
    throw new InvalidRetrievalParamsError('similarityThreshold must be a number');
  }
}

@Injectable()
export class SimilarityRetrieverService {
  private readonly logger = new Logger(SimilarityRetrieverService.name);

  async retrieve(params: RetrieveParams): Promise<ScoredChunk[]> {
    validateParams(params);

    const { corpus, query, modelId } = params;
    if (corpus.length === 0) {
      return [];
    }

    let queryEmbedding: number[];
    try {
      queryEmbedding = await params.embed(query, modelId);
    } catch (error) {
      if (error instanceof EmbeddingFailedError) {
        throw error;
      }
      throw new EmbeddingFailedError(
        modelId,
        error instanceof Error ? error : undefined,
      );
    }

    const scored: ScoredChunk[] = corpus.map((chunk, index) => {
      if (chunk.embedding.length !== queryEmbedding.length) {
        throw new EmbeddingDimensionMismatchError(
          queryEmbedding.length,
          chunk.embedding.length,
          index,
        );
      }
      return {
        ...chunk,
        similarity: cosineSimilarity(queryEmbedding, chunk.embedding),
      };
    });

    // Array.prototype.sort is stable: ties keep corpus order
    const ranked = scored
      .filter((chunk) => chunk.similarity >= params.similarityThreshold)
      .sort((a, b) => b.similarity - a.similarity);

    if (ranked.length === 0) {
      this.logger.debug(
        `[Retrieve] stage=retrieve substage=score status=empty corpus=${corpus.length}`,
      );
      return [];
    }

    const top = ranked[0].similarity;
    const results = ranked
      .filter((chunk) => top - chunk.similarity <= params.maxSimilarityDelta)
      .slice(0, params.filterLimit);

    this.logger.debug(
      `[Retrieve] stage=retrieve substage=score status=completed ` +
        `corpus=${corpus.length} above_threshold=${ranked.length} ` +
        `returned=${results.length} top=${top.toFixed(4)}`,
    );

    return results;
  }
}
