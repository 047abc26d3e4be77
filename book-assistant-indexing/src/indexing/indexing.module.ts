import { Module } from '@nestjs/common';
import { IndexingService } from './indexing.service';
import { IndexingController } from './indexing.controller';
import { WorkflowModule } from './workflow/workflow.module';
import { PersistStageModule } from './stages/persist/persist-stage.module';

@Module({
  imports: [WorkflowModule, PersistStageModule],
  controllers: [IndexingController],
  providers: [IndexingService],
  exports: [IndexingService],
})
export class IndexingModule {}
