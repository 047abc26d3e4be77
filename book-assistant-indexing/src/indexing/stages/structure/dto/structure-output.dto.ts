/**
 * Structure Stage Output DTO
 */

import { StructuredChapter } from '../types';

export interface StructureOutputDto {
  chapter: StructuredChapter;
  processingTime: number;
}
