/**
 * Embed Stage LangGraph Node
 */

import { Logger } from '@nestjs/common';
import { EmbedStage } from '../../stages/embed';
import type { CorpusRecord } from '../../types/corpus.types';
import {
  IndexingStateType,
  completeStage,
  failStage,
} from '../indexing-state';

const logger = new Logger('EmbedNode');

/**
 * Create Embed Node for LangGraph workflow
 */
export function createEmbedNode(embedStage: EmbedStage) {
  return async (
    state: IndexingStateType,
  ): Promise<Partial<IndexingStateType>> => {
    const bookTitle = state.book?.metadata.title ?? state.filePath;
    const records: CorpusRecord[] = [
      ...state.chapters.flatMap((chapter) => chapter.records),
      ...state.summaries,
    ];

    logger.log(`[Embed Node] Starting for "${bookTitle}" (${records.length} records)`);

    try {
      const output = await embedStage.execute({ bookTitle, records });

      return {
        embeddedChunks: output.chunks,
        embeddingMetadata: output.metadata,
        ...completeStage(state, 'embed', {
          embeddingsGenerated: output.chunks.length,
        }),
      };
    } catch (error) {
      logger.error(
        `[Embed Node] Failed for "${bookTitle}"`,
        error instanceof Error ? error.stack : String(error),
      );
      return failStage(state, 'embed', error);
    }
  };
}
