/**
 * Retrieval Result DTO
 * Output of POST /query
 */

import type { SourceChunk } from '../types';

export interface RetrievalMetricsDto {
  totalDuration: number;
  corpusSize: number;
  candidateCount: number;
  resultCount: number;
  topSimilarity: number | null;
  stagesCompleted: string[];
}

export interface RetrievalResultDto {
  /**
   * null in retrieval_only mode
   */
  answer: string | null;
  sources: SourceChunk[];
  metrics: RetrievalMetricsDto;
}
