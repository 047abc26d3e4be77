/**
 * Persist Stage LangGraph Node
 */

import { Logger } from '@nestjs/common';
import { PersistStage } from '../../stages/persist';
import {
  IndexingStateType,
  completeStage,
  failStage,
} from '../indexing-state';

const logger = new Logger('PersistNode');

export function createPersistNode(persistStage: PersistStage) {
  return async (
    state: IndexingStateType,
  ): Promise<Partial<IndexingStateType>> => {
    const bookTitle = state.book?.metadata.title ?? state.filePath;

    try {
      const { corpusPath } = await persistStage.execute({
        outputDir: state.outputDir,
        bookTitle,
        chunks: state.embeddedChunks,
      });

      const endTime = new Date();
      return {
        corpusPath,
        ...completeStage(state, 'persist', {
          endTime,
          duration: state.metrics.startTime
            ? endTime.getTime() - state.metrics.startTime.getTime()
            : undefined,
        }),
      };
    } catch (error) {
      logger.error(
        `[Persist Node] Failed for "${bookTitle}"`,
        error instanceof Error ? error.stack : String(error),
      );
      return failStage(state, 'persist', error);
    }
  };
}
