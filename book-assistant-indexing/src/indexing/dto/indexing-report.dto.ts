import type { SkippedChapter } from '../stages/extract/types';

export interface BookIndexingReport {
  filePath: string;
  title: string | null;
  success: boolean;
  corpusPath: string | null;
  chunkCount: number;
  skippedChapters: SkippedChapter[];
  errors: string[];
  durationMs: number;
}

export interface IndexingReportDto {
  inputDir: string;
  outputDir: string;
  books: BookIndexingReport[];
  combinedCorpusPath: string | null;
  catalogPath: string | null;
  totalChunks: number;
  durationMs: number;
}
