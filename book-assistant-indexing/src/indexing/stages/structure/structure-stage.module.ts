/**
 * Structure Stage Module
 */

import { Module } from '@nestjs/common';
import { StructureStage } from './structure.stage';
import { ContentExtractor } from './extractors';
import { HierarchyBuilder } from './builders';

@Module({
  providers: [StructureStage, ContentExtractor, HierarchyBuilder],
  exports: [StructureStage],
})
export class StructureStageModule {}
