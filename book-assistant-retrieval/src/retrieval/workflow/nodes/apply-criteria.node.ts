/**
 * Apply Criteria Node for LangGraph Workflow
 * Narrows the corpus to the requested books, chapters, authors or types.
 */

import { Logger } from '@nestjs/common';
import { RetrievalStateType, completeStage } from '../state/retrieval-state';
import { filterByCriteria } from '../../services/criteria-filter';

const logger = new Logger('ApplyCriteriaNode');

export function createApplyCriteriaNode() {
  return (state: RetrievalStateType): Partial<RetrievalStateType> => {
    const candidates = filterByCriteria(state.corpus, state.filters);

    logger.debug(
      `[Criteria] stage=criteria sets=${state.filters.length} ` +
        `corpus=${state.corpus.length} candidates=${candidates.length}`,
    );

    return {
      candidates,
      ...completeStage(state, 'criteria', { candidateCount: candidates.length }),
    };
  };
}
