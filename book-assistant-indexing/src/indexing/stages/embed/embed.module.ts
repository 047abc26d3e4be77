/**
 * Embed Stage Module
 */

import { Module } from '@nestjs/common';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { EmbeddingGenerationService } from './embedding-generation.service';
import { EmbedStage } from './embed.stage';

@Module({
  providers: [EmbeddingProviderFactory, EmbeddingGenerationService, EmbedStage],
  exports: [EmbedStage, EmbeddingProviderFactory],
})
export class EmbedModule {}
