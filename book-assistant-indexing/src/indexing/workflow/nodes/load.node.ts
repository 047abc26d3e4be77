/**
 * Load Stage Node for LangGraph Workflow
 */

import { Logger } from '@nestjs/common';
import {
  IndexingStateType,
  completeStage,
  failStage,
} from '../indexing-state';
import { LoadStage } from '../../stages/load';

const logger = new Logger('LoadNode');

/**
 * Load Stage Node Function
 *
 * @param state - Current workflow state
 * @param loadStage - Injected LoadStage service
 * @returns Partial state update
 */
export async function loadNode(
  state: IndexingStateType,
  loadStage: LoadStage,
): Promise<Partial<IndexingStateType>> {
  logger.log(`Executing Load Node for file: ${state.filePath}`);

  try {
    const { book, skippedChapters } = await loadStage.execute({
      filePath: state.filePath,
    });

    return {
      book,
      unreadableChapters: skippedChapters,
      ...completeStage(state, 'load'),
    };
  } catch (error) {
    logger.error(
      `Load node failed for file ${state.filePath}`,
      error instanceof Error ? error.stack : String(error),
    );
    return failStage(state, 'load', error);
  }
}

/**
 * Factory function to create Load Node with injected dependencies
 */
export function createLoadNode(loadStage: LoadStage) {
  return async (
    state: IndexingStateType,
  ): Promise<Partial<IndexingStateType>> => {
    return loadNode(state, loadStage);
  };
}
