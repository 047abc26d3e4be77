/**
 * Indexing Workflow Service
 *
 * LangGraph.js StateGraph for one book:
 * Load → Extract → Summarize → Embed → Persist
 * A stage that records an error ends the run.
 */

import { Injectable, Logger } from '@nestjs/common';
import { StateGraph, START, END } from '@langchain/langgraph';
import {
  IndexingState,
  IndexingStateType,
  createInitialState,
} from './indexing-state';
import { createLoadNode } from './nodes/load.node';
import { createExtractNode } from './nodes/extract.node';
import { createSummarizeNode } from './nodes/summarize.node';
import { createEmbedNode } from './nodes/embed.node';
import { createPersistNode } from './nodes/persist.node';
import { LoadStage } from '../stages/load';
import { ChapterExtractionService } from '../stages/extract';
import { ChapterSummarizerService } from '../stages/summarize';
import { EmbedStage } from '../stages/embed';
import { PersistStage } from '../stages/persist';

export interface BookJobData {
  filePath: string;
  outputDir: string;
}

export interface WorkflowResult {
  success: boolean;
  finalState: IndexingStateType;
  errors: string[];
  metrics: {
    duration: number;
    stagesCompleted: string[];
  };
}

/**
 * Type guard to validate workflow result matches expected state type
 */
function isIndexingStateType(value: unknown): value is IndexingStateType {
  if (!value || typeof value !== 'object') {
    return false;
  }

  return (
    'filePath' in value &&
    typeof value.filePath === 'string' &&
    'currentStage' in value &&
    typeof value.currentStage === 'string' &&
    'errors' in value &&
    Array.isArray(value.errors) &&
    'metrics' in value &&
    typeof value.metrics === 'object' &&
    value.metrics !== null
  );
}

function continueUnlessFailed(
  state: IndexingStateType,
): 'continue' | 'failed' {
  return state.errors.length > 0 ? 'failed' : 'continue';
}

@Injectable()
export class IndexingWorkflowService {
  private readonly logger = new Logger(IndexingWorkflowService.name);
  private workflow: ReturnType<typeof StateGraph.prototype.compile> | null =
    null;

  constructor(
    private readonly loadStage: LoadStage,
    private readonly extractionService: ChapterExtractionService,
    private readonly summarizer: ChapterSummarizerService,
    private readonly embedStage: EmbedStage,
    private readonly persistStage: PersistStage,
  ) {
    this.initializeWorkflow();
  }

  private initializeWorkflow(): void {
    this.logger.log('Initializing LangGraph indexing workflow...');

    try {
      const graph = new StateGraph(IndexingState)
        .addNode('load', createLoadNode(this.loadStage))
        .addNode('extract', createExtractNode(this.extractionService))
        .addNode('summarize', createSummarizeNode(this.summarizer))
        .addNode('embed', createEmbedNode(this.embedStage))
        .addNode('persist', createPersistNode(this.persistStage))
        .addEdge(START, 'load')
        .addConditionalEdges('load', continueUnlessFailed, {
          continue: 'extract',
          failed: END,
        })
        .addConditionalEdges('extract', continueUnlessFailed, {
          continue: 'summarize',
          failed: END,
        })
        .addEdge('summarize', 'embed')
        .addConditionalEdges('embed', continueUnlessFailed, {
          continue: 'persist',
          failed: END,
        })
        .addEdge('persist', END);

      this.workflow = graph.compile();

      this.logger.log('LangGraph indexing workflow initialized');
    } catch (error) {
      this.logger.error(
        'Failed to initialize LangGraph workflow',
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  /**
   * Index one EPUB file into a per-book corpus
   */
  async executeWorkflow(jobData: BookJobData): Promise<WorkflowResult> {
    const startTime = Date.now();

    this.logger.log(`Starting indexing workflow for ${jobData.filePath}`);

    if (!this.workflow) {
      throw new Error('Workflow not initialized');
    }

    const result = await this.workflow.invoke(createInitialState(jobData));

    if (!isIndexingStateType(result)) {
      throw new Error('Workflow returned invalid state type');
    }

    const finalState: IndexingStateType = result;
    const duration = Date.now() - startTime;
    const stagesCompleted = finalState.metrics.stagesCompleted ?? [];

    if (finalState.errors.length > 0) {
      this.logger.warn(
        `Workflow failed at ${finalState.currentStage} for ${jobData.filePath}: ` +
          finalState.errors.join(', '),
      );
      return {
        success: false,
        finalState,
        errors: finalState.errors,
        metrics: { duration, stagesCompleted },
      };
    }

    this.logger.log(
      `Workflow completed for ${jobData.filePath} ` +
        `(${duration}ms, stages: ${stagesCompleted.join(' → ')})`,
    );

    return {
      success: true,
      finalState,
      errors: [],
      metrics: { duration, stagesCompleted },
    };
  }

  isInitialized(): boolean {
    return this.workflow !== null;
  }
}
