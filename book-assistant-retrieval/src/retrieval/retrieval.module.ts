/**
 * Retrieval Module
 * Main module for retrieval service functionality
 */

import { Module } from '@nestjs/common';
import { WorkflowModule } from './workflow/workflow.module';
import { RetrievalService } from './retrieval.service';
import { RetrievalController } from './retrieval.controller';
import { HealthController } from './health.controller';

@Module({
  imports: [WorkflowModule],
  providers: [RetrievalService],
  controllers: [RetrievalController, HealthController],
})
export class RetrievalModule {}
