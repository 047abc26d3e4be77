import type { BookCatalog } from '../types';

export interface PersistOutputDto {
  corpusPath: string;
  chunkCount: number;
  durationMs: number;
}

export interface PersistLibraryOutputDto {
  corpusPath: string;
  catalogPath: string;
  catalog: BookCatalog;
  chunkCount: number;
}
