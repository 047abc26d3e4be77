/**
 * Indexing Workflow State Definition
 * One book per workflow run.
 */

import { Annotation } from '@langchain/langgraph';
import type { ChapterSummary, EmbeddedChunk } from '../types/corpus.types';
import type { LoadedBook } from '../stages/load/types';
import type {
  ExtractedChapter,
  SkippedChapter,
} from '../stages/extract/types';
import type { EmbedOutputDto } from '../stages/embed/types';

export type EmbeddingMetadata = EmbedOutputDto['metadata'];

/**
 * Workflow Metrics
 */
export interface WorkflowMetrics {
  startTime?: Date;
  endTime?: Date;
  duration?: number;
  stagesCompleted?: string[];
  paragraphsExtracted?: number;
  summariesGenerated?: number;
  embeddingsGenerated?: number;
}

/**
 * Indexing State Graph Definition
 */
export const IndexingState = Annotation.Root({
  // Input
  filePath: Annotation<string>,
  outputDir: Annotation<string>,

  // Load stage output
  book: Annotation<LoadedBook | null>,
  unreadableChapters: Annotation<string[]>,

  // Extract stage output
  chapters: Annotation<ExtractedChapter[]>,
  skippedChapters: Annotation<SkippedChapter[]>,

  // Summarize stage output
  summaries: Annotation<ChapterSummary[]>,

  // Embed stage output
  embeddedChunks: Annotation<EmbeddedChunk[]>,
  embeddingMetadata: Annotation<EmbeddingMetadata | null>,

  // Persist stage output
  corpusPath: Annotation<string | null>,

  // Workflow metadata
  currentStage: Annotation<string>,
  errors: Annotation<string[]>,
  metrics: Annotation<WorkflowMetrics>,
});

export type IndexingStateType = typeof IndexingState.State;

export function createInitialState(input: {
  filePath: string;
  outputDir: string;
}): IndexingStateType {
  return {
    filePath: input.filePath,
    outputDir: input.outputDir,

    book: null,
    unreadableChapters: [],

    chapters: [],
    skippedChapters: [],

    summaries: [],

    embeddedChunks: [],
    embeddingMetadata: null,

    corpusPath: null,

    currentStage: 'init',
    errors: [],
    metrics: {
      startTime: new Date(),
      stagesCompleted: [],
    },
  };
}

export function completeStage(
  state: IndexingStateType,
  stage: string,
  metrics: Partial<WorkflowMetrics> = {},
): Pick<IndexingStateType, 'currentStage' | 'metrics'> {
  return {
    currentStage: stage,
    metrics: {
      ...state.metrics,
      ...metrics,
      stagesCompleted: [...(state.metrics.stagesCompleted ?? []), stage],
    },
  };
}

export function failStage(
  state: IndexingStateType,
  stage: string,
  error: unknown,
): Pick<IndexingStateType, 'currentStage' | 'errors'> {
  return {
    currentStage: `${stage}_failed`,
    errors: [
      ...state.errors,
      error instanceof Error ? error.message : String(error),
    ],
  };
}
