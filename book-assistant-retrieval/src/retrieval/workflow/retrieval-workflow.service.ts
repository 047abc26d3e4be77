/**
 * Retrieval Workflow Service
 *
 * LangGraph.js StateGraph for one question:
 * Load Corpus → Criteria → Retrieve → (Generate Answer)
 * Failures end the run and are reported as ANSWER_FAILURE_MESSAGE with no
 * sources, so callers never see a raw exception for a query.
 */

import { Injectable, Logger } from '@nestjs/common';
import { StateGraph, START, END } from '@langchain/langgraph';
import {
  RetrievalState,
  type RetrievalStateType,
  createInitialState,
  type QueryRequest,
} from './state/retrieval-state';
import {
  createApplyCriteriaNode,
  createGenerateAnswerNode,
  createLoadCorpusNode,
  createRetrieveNode,
} from './nodes';
import { CorpusService } from '../services/corpus.service';
import { SimilarityRetrieverService } from '../services/similarity-retriever.service';
import { QueryEmbeddingService } from '../services/query-embedding.service';
import { AnswerGenerationService } from '../services/answer-generation.service';
import { ANSWER_FAILURE_MESSAGE } from '../services/answer-prompts';
import { toSourceChunk } from '../services/source-chunk';
import type { RetrievalResultDto } from '../dto/retrieval-result.dto';

/**
 * Type guard to validate workflow result matches expected state type
 */
function isRetrievalStateType(value: unknown): value is RetrievalStateType {
  if (!value || typeof value !== 'object') {
    return false;
  }

  return (
    'query' in value &&
    typeof value.query === 'string' &&
    'results' in value &&
    Array.isArray(value.results) &&
    'errors' in value &&
    Array.isArray(value.errors) &&
    'metrics' in value &&
    typeof value.metrics === 'object' &&
    value.metrics !== null
  );
}

function continueUnlessFailed(
  state: RetrievalStateType,
): 'continue' | 'failed' {
  return state.errors.length > 0 ? 'failed' : 'continue';
}

function selectMode(
  state: RetrievalStateType,
): 'generate' | 'done' | 'failed' {
  if (state.errors.length > 0) {
    return 'failed';
  }
  return state.mode === 'generation' ? 'generate' : 'done';
}

@Injectable()
export class RetrievalWorkflowService {
  private readonly logger = new Logger(RetrievalWorkflowService.name);
  private workflow: ReturnType<typeof StateGraph.prototype.compile> | null =
    null;

  constructor(
    private readonly corpusService: CorpusService,
    private readonly retriever: SimilarityRetrieverService,
    private readonly queryEmbedding: QueryEmbeddingService,
    private readonly answerService: AnswerGenerationService,
  ) {
    this.initializeWorkflow();
  }

  private initializeWorkflow(): void {
    this.logger.log('Initializing LangGraph retrieval workflow...');

    try {
      const graph = new StateGraph(RetrievalState)
        .addNode('loadCorpus', createLoadCorpusNode(this.corpusService))
        .addNode('applyCriteria', createApplyCriteriaNode())
        .addNode(
          'retrieve',
          createRetrieveNode(this.retriever, this.queryEmbedding),
        )
        .addNode('generateAnswer', createGenerateAnswerNode(this.answerService))
        .addEdge(START, 'loadCorpus')
        .addConditionalEdges('loadCorpus', continueUnlessFailed, {
          continue: 'applyCriteria',
          failed: END,
        })
        .addEdge('applyCriteria', 'retrieve')
        .addConditionalEdges('retrieve', selectMode, {
          generate: 'generateAnswer',
          done: END,
          failed: END,
        })
        .addEdge('generateAnswer', END);

      this.workflow = graph.compile();

      this.logger.log('LangGraph retrieval workflow initialized');
    } catch (error) {
      this.logger.error(
        'Failed to initialize LangGraph workflow',
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  /**
   * @throws UnsupportedEmbeddingModelError for a model that is not configured
   */
  resolveModelId(requested?: string): string {
    return this.queryEmbedding.resolveModelId(requested);
  }

  async executeWorkflow(request: QueryRequest): Promise<RetrievalResultDto> {
    const startTime = Date.now();
    const mode = request.mode ?? 'generation';

    this.logger.log(
      `Starting retrieval workflow for query: "${request.query}" ` +
        `(mode: ${mode}, filters: ${request.filters?.length ?? 0})`,
    );

    if (!this.workflow) {
      throw new Error('Workflow not initialized');
    }

    let finalState: RetrievalStateType;
    try {
      const result = await this.workflow.invoke(createInitialState(request));
      if (!isRetrievalStateType(result)) {
        throw new Error('Invalid workflow result - type guard failed');
      }
      finalState = result;
    } catch (error) {
      this.logger.error(
        'Retrieval workflow execution failed',
        error instanceof Error ? error.stack : String(error),
      );
      return this.failureResult(startTime, []);
    }

    if (finalState.errors.length > 0) {
      this.logger.warn(
        `Workflow failed at ${finalState.currentStage}: ${finalState.errors.join(', ')}`,
      );
      return this.failureResult(startTime, finalState.metrics.stagesCompleted);
    }

    const formatted = this.formatResult(finalState, startTime);

    this.logger.log(
      `Retrieval workflow completed: ${formatted.sources.length} sources, ` +
        `${formatted.metrics.totalDuration}ms`,
    );

    return formatted;
  }

  private formatResult(
    state: RetrievalStateType,
    startTime: number,
  ): RetrievalResultDto {
    return {
      answer: state.mode === 'generation' ? state.answer : null,
      sources: state.results.map(toSourceChunk),
      metrics: {
        totalDuration: Date.now() - startTime,
        corpusSize: state.corpus.length,
        candidateCount: state.candidates.length,
        resultCount: state.results.length,
        topSimilarity: state.metrics.topSimilarity ?? null,
        stagesCompleted: state.metrics.stagesCompleted,
      },
    };
  }

  private failureResult(
    startTime: number,
    stagesCompleted: string[],
  ): RetrievalResultDto {
    return {
      answer: ANSWER_FAILURE_MESSAGE,
      sources: [],
      metrics: {
        totalDuration: Date.now() - startTime,
        corpusSize: 0,
        candidateCount: 0,
        resultCount: 0,
        topSimilarity: null,
        stagesCompleted,
      },
    };
  }

  isInitialized(): boolean {
    return this.workflow !== null;
  }
}
