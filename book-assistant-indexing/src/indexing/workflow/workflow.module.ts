import { Module } from '@nestjs/common';
import { IndexingWorkflowService } from './indexing-workflow.service';
import { LoadStageModule } from '../stages/load/load-stage.module';
import { ExtractStageModule } from '../stages/extract';
import { SummarizeStageModule } from '../stages/summarize';
import { EmbedModule } from '../stages/embed';
import { PersistStageModule } from '../stages/persist';

@Module({
  imports: [
    LoadStageModule,
    ExtractStageModule,
    SummarizeStageModule,
    EmbedModule,
    PersistStageModule,
  ],
  providers: [IndexingWorkflowService],
  exports: [IndexingWorkflowService],
})
export class WorkflowModule {}
