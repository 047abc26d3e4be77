/**
 * Summarize Stage Node for LangGraph Workflow
 * Summaries are optional; this node never fails the workflow.
 */

import { Logger } from '@nestjs/common';
import { IndexingStateType, completeStage } from '../indexing-state';
import { ChapterSummarizerService } from '../../stages/summarize';

const logger = new Logger('SummarizeNode');

export function createSummarizeNode(summarizer: ChapterSummarizerService) {
  return async (
    state: IndexingStateType,
  ): Promise<Partial<IndexingStateType>> => {
    if (!state.book || !summarizer.isEnabled()) {
      return { summaries: [], ...completeStage(state, 'summarize') };
    }

    logger.log(
      `[Summarize Node] Starting for "${state.book.metadata.title}" ` +
        `(${state.chapters.length} chapters)`,
    );

    const summaries = await summarizer.summarizeBook(
      state.chapters.map((chapter) => ({
        chapter: chapter.chapter,
        text: chapter.rawText,
      })),
      state.book.metadata,
    );

    return {
      summaries,
      ...completeStage(state, 'summarize', {
        summariesGenerated: summaries.length,
      }),
    };
  };
}
