import { Controller, Get } from '@nestjs/common';
import { RetrievalWorkflowService } from './workflow/retrieval-workflow.service';

@Controller('health')
export class HealthController {
  constructor(private readonly workflowService: RetrievalWorkflowService) {}

  @Get()
  check(): { status: 'ok' | 'degraded'; workflowReady: boolean } {
    const workflowReady = this.workflowService.isInitialized();
    return { status: workflowReady ? 'ok' : 'degraded', workflowReady };
  }
}
