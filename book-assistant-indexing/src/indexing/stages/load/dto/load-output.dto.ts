/**
 * Load Stage Output DTO
 */

import { LoadedBook } from '../types';

export interface LoadOutputDto {
  book: LoadedBook;
  skippedChapters: string[];
  processingTime: number;
}
