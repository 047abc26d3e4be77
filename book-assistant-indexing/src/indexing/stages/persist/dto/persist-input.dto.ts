import type { EmbeddedChunk } from '../../../types/corpus.types';

export interface PersistInputDto {
  outputDir: string;
  bookTitle: string;
  chunks: EmbeddedChunk[];
}

export interface PersistLibraryInputDto {
  outputDir: string;
  chunks: EmbeddedChunk[];
}
