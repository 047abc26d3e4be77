/**
 * Workflow Module
 * Provides RetrievalWorkflowService with all required dependencies
 */

import { Module } from '@nestjs/common';
import { RetrievalWorkflowService } from './retrieval-workflow.service';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { CorpusService } from '../services/corpus.service';
import { QueryEmbeddingService } from '../services/query-embedding.service';
import { SimilarityRetrieverService } from '../services/similarity-retriever.service';
import { AnswerGenerationService } from '../services/answer-generation.service';

@Module({
  providers: [
    // Workflow service
    RetrievalWorkflowService,

    // Factories
    EmbeddingProviderFactory,
    LLMProviderFactory,

    // Services
    CorpusService,
    QueryEmbeddingService,
    SimilarityRetrieverService,
    AnswerGenerationService,
  ],
  exports: [RetrievalWorkflowService, CorpusService],
})
export class WorkflowModule {}
