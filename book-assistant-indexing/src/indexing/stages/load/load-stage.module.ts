import { Module } from '@nestjs/common';
import { LoadStage } from './load.stage';
import { EpubReaderService } from './services';

/**
 * Load Stage Module
 */
@Module({
  providers: [LoadStage, EpubReaderService],
  exports: [LoadStage],
})
export class LoadStageModule {}
