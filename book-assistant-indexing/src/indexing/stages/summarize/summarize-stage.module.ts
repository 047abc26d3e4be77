import { Module } from '@nestjs/common';
import { LlmModule } from '../../llm';
import { ChapterSummarizerService } from './chapter-summarizer.service';

/**
 * Summarize Stage Module
 */
@Module({
  imports: [LlmModule],
  providers: [ChapterSummarizerService],
  exports: [ChapterSummarizerService],
})
export class SummarizeStageModule {}
