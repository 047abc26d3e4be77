/**
 * Load Corpus Node for LangGraph Workflow
 */

import { Logger } from '@nestjs/common';
import {
  RetrievalStateType,
  completeStage,
  failStage,
} from '../state/retrieval-state';
import { CorpusService } from '../../services/corpus.service';

const logger = new Logger('LoadCorpusNode');

export function createLoadCorpusNode(corpusService: CorpusService) {
  return async (
    state: RetrievalStateType,
  ): Promise<Partial<RetrievalStateType>> => {
    try {
      const corpus = await corpusService.getCorpus();
      return {
        corpus,
        ...completeStage(state, 'load_corpus', { corpusSize: corpus.length }),
      };
    } catch (error) {
      logger.error(
        '[LoadCorpus] stage=load_corpus status=failed',
        error instanceof Error ? error.stack : String(error),
      );
      return failStage(state, 'load_corpus', error);
    }
  };
}
