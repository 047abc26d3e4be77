/**
 * Generate Answer Node for LangGraph Workflow
 * AnswerGenerationService never throws; its failure message is the answer.
 */

import { RetrievalStateType, completeStage } from '../state/retrieval-state';
import { AnswerGenerationService } from '../../services/answer-generation.service';
import { toSourceChunk } from '../../services/source-chunk';

export function createGenerateAnswerNode(answerService: AnswerGenerationService) {
  return async (
    state: RetrievalStateType,
  ): Promise<Partial<RetrievalStateType>> => {
    const startTime = Date.now();

    const answer = await answerService.generateAnswer({
      question: state.query,
      sources: state.results.map(toSourceChunk),
      history: state.history,
    });

    return {
      answer,
      ...completeStage(state, 'generate', {
        generationDuration: Date.now() - startTime,
      }),
    };
  };
}
