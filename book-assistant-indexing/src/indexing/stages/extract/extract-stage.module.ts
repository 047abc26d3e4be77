/**
 * Extract Stage Module
 */

import { Module } from '@nestjs/common';
import { StructureStageModule } from '../structure';
import { ResolveStageModule } from '../resolve';
import { FlattenStageModule } from '../flatten';
import { PersistStageModule } from '../persist/persist-stage.module';
import { ChapterExtractionService } from './chapter-extraction.service';

@Module({
  imports: [
    StructureStageModule,
    ResolveStageModule,
    FlattenStageModule,
    PersistStageModule,
  ],
  providers: [ChapterExtractionService],
  exports: [ChapterExtractionService],
})
export class ExtractStageModule {}
