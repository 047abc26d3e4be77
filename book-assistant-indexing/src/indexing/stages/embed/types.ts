/**
 * Embed Stage Types
 */

import type {
  CorpusRecord,
  EmbeddedChunk,
} from '../../types/corpus.types';

export type EmbeddingProviderName = 'ollama' | 'openai' | 'google';

export interface EmbeddingModelRef {
  provider: EmbeddingProviderName;
  model: string;
  modelId: string;
}

export interface EmbeddingFailure {
  /** Position of the text in the batch input */
  index: number;
  error: string;
}

export interface BatchResult {
  embeddings: Array<number[] | null>;
  failed: EmbeddingFailure[];
  durationMs: number;
}

export interface EmbedInputDto {
  bookTitle: string;
  records: CorpusRecord[];
}

export interface EmbedOutputDto {
  chunks: EmbeddedChunk[];
  metadata: {
    provider: EmbeddingProviderName;
    model: string;
    modelId: string;
    /** Length of the vectors produced, 0 when nothing was embedded */
    dimensions: number;
    totalRecords: number;
    embeddedCount: number;
    failedCount: number;
    durationMs: number;
  };
}
