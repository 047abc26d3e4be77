/**
 * Persist Stage Module
 */

import { Module } from '@nestjs/common';
import { CorpusWriterService } from './services/corpus-writer.service';
import { PersistStage } from './persist.stage';

@Module({
  providers: [CorpusWriterService, PersistStage],
  exports: [PersistStage, CorpusWriterService],
})
export class PersistStageModule {}
