import { Module } from '@nestjs/common';
import { FlattenStage } from './flatten.stage';
import { TokenCounterService } from './services';

/**
 * Flatten Stage Module
 */
@Module({
  providers: [FlattenStage, TokenCounterService],
  exports: [FlattenStage, TokenCounterService],
})
export class FlattenStageModule {}
