/**
 * Extract Stage Node for LangGraph Workflow
 */

import { Logger } from '@nestjs/common';
import {
  IndexingStateType,
  completeStage,
  failStage,
} from '../indexing-state';
import { ChapterExtractionService } from '../../stages/extract';

const logger = new Logger('ExtractNode');

export function createExtractNode(extractionService: ChapterExtractionService) {
  return async (
    state: IndexingStateType,
  ): Promise<Partial<IndexingStateType>> => {
    if (!state.book) {
      return failStage(state, 'extract', 'No loaded book available for extraction');
    }

    try {
      const { chapters, skipped } = await extractionService.extractBook(
        state.book,
        state.outputDir,
      );
      const paragraphsExtracted = chapters.reduce(
        (sum, chapter) => sum + chapter.records.length,
        0,
      );

      if (paragraphsExtracted === 0) {
        return failStage(
          state,
          'extract',
          `No paragraphs extracted from "${state.book.metadata.title}"`,
        );
      }

      return {
        chapters,
        skippedChapters: skipped,
        ...completeStage(state, 'extract', { paragraphsExtracted }),
      };
    } catch (error) {
      logger.error(
        `Extract node failed for "${state.book.metadata.title}"`,
        error instanceof Error ? error.stack : String(error),
      );
      return failStage(state, 'extract', error);
    }
  };
}
