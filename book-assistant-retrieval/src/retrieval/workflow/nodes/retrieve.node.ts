/**
 * Retrieve Node for LangGraph Workflow
 */

import { Logger } from '@nestjs/common';
import {
  RetrievalStateType,
  completeStage,
  failStage,
} from '../state/retrieval-state';
import { SimilarityRetrieverService } from '../../services/similarity-retriever.service';
import { QueryEmbeddingService } from '../../services/query-embedding.service';

const logger = new Logger('RetrieveNode');

export function createRetrieveNode(
  retriever: SimilarityRetrieverService,
  queryEmbedding: QueryEmbeddingService,
) {
  return async (
    state: RetrievalStateType,
  ): Promise<Partial<RetrievalStateType>> => {
    const startTime = Date.now();

    try {
      const results = await retriever.retrieve({
        corpus: state.candidates,
        query: state.query,
        ...state.params,
        embed: (text, modelId) => queryEmbedding.embedQuery(text, modelId),
        modelId: state.modelId,
      });

      return {
        results,
        ...completeStage(state, 'retrieve', {
          resultCount: results.length,
          topSimilarity: results.length > 0 ? results[0].similarity : null,
          retrievalDuration: Date.now() - startTime,
        }),
      };
    } catch (error) {
      logger.error(
        `[Retrieve] stage=retrieve status=failed duration=${Date.now() - startTime}ms`,
        error instanceof Error ? error.stack : String(error),
      );
      return failStage(state, 'retrieve', error);
    }
  };
}
