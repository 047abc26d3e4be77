/**
 * Extract Stage Type Definitions
 */

import type { ParagraphRecord } from '../../../types/corpus.types';
import type { ResolutionSource } from '../../resolve/types';

export interface ExtractedChapter {
  order: number;
  href: string;
  // Composed label: "Chapter 2: The Road", "Chapter 2", "The Road" or null
  chapter: string | null;
  resolutionSource: ResolutionSource;
  rawText: string;
  records: ParagraphRecord[];
}

export type SkipReason = 'empty' | 'table_of_contents' | 'failed';

export interface SkippedChapter {
  order: number;
  href: string;
  reason: SkipReason;
  message?: string;
}

export interface ExtractOutput {
  chapters: ExtractedChapter[];
  skipped: SkippedChapter[];
  durationMs: number;
}
