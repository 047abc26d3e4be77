/**
 * Resolve Stage Module
 */

import { Module } from '@nestjs/common';
import { LlmModule } from '../../llm';
import { ChapterHeadingMatcher } from './matchers';
import { ChapterTitleResolver } from './chapter-title.resolver';

@Module({
  imports: [LlmModule],
  providers: [ChapterHeadingMatcher, ChapterTitleResolver],
  exports: [ChapterTitleResolver],
})
export class ResolveStageModule {}
