/**
 * Retrieval Workflow State Definition
 * One question per workflow run.
 */

import { Annotation } from '@langchain/langgraph';
import type {
  ChatTurn,
  ConstraintSet,
  EmbeddedChunk,
  ScoredChunk,
} from '../../types';

export type RetrievalMode = 'retrieval_only' | 'generation';

export interface RetrievalParams {
  similarityThreshold: number;
  filterLimit: number;
  maxSimilarityDelta: number;
}

/**
 * Query Request Input
 */
export interface QueryRequest {
  query: string;
  history?: ChatTurn[];
  filters?: ConstraintSet[];
  mode?: RetrievalMode;
  params: RetrievalParams;
  modelId: string;
}

/**
 * Workflow Metrics
 */
export interface WorkflowMetrics {
  startTime: number;
  endTime?: number;
  totalDuration?: number;
  corpusSize?: number;
  candidateCount?: number;
  resultCount?: number;
  topSimilarity?: number | null;
  retrievalDuration?: number;
  generationDuration?: number;
  stagesCompleted: string[];
}

export const RetrievalState = Annotation.Root({
  // Input
  query: Annotation<string>,
  history: Annotation<ChatTurn[]>,
  filters: Annotation<ConstraintSet[]>,
  mode: Annotation<RetrievalMode>,
  params: Annotation<RetrievalParams>,
  modelId: Annotation<string>,

  // Corpus snapshot and criteria filter output
  corpus: Annotation<readonly EmbeddedChunk[]>,
  candidates: Annotation<EmbeddedChunk[]>,

  // Similarity retrieval output
  results: Annotation<ScoredChunk[]>,

  // Answer generation output
  answer: Annotation<string | null>,

  // Workflow metadata
  currentStage: Annotation<string>,
  errors: Annotation<string[]>,
  metrics: Annotation<WorkflowMetrics>,
});

export type RetrievalStateType = typeof RetrievalState.State;

export function createInitialState(request: QueryRequest): RetrievalStateType {
  return {
    query: request.query,
    history: request.history ?? [],
    filters: request.filters ?? [],
    mode: request.mode ?? 'generation',
    params: request.params,
    modelId: request.modelId,

    corpus: [],
    candidates: [],
    results: [],
    answer: null,

    currentStage: 'init',
    errors: [],
    metrics: {
      startTime: Date.now(),
      stagesCompleted: [],
    },
  };
}

export function completeStage(
  state: RetrievalStateType,
  stage: string,
  metrics: Partial<WorkflowMetrics> = {},
): Pick<RetrievalStateType, 'currentStage' | 'metrics'> {
  return {
    currentStage: stage,
    metrics: {
      ...state.metrics,
      ...metrics,
      stagesCompleted: [...state.metrics.stagesCompleted, stage],
    },
  };
}

export function failStage(
  state: RetrievalStateType,
  stage: string,
  error: unknown,
): Pick<RetrievalStateType, 'currentStage' | 'errors'> {
  return {
    currentStage: `${stage}_failed`,
    errors: [
      ...state.errors,
      error instanceof Error ? error.message : String(error),
    ],
  };
}
