/**
 * Embed Stage Exports
 */

export { EmbedModule } from './embed.module';
export { EmbedStage } from './embed.stage';
export { EmbeddingProviderFactory } from './embedding-provider.factory';
export { EmbeddingGenerationService } from './embedding-generation.service';
export * from './errors';
export * from './types';
