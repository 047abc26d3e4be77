/**
 * Load Stage Type Definitions
 */

import type { BookMetadata } from '../../../types/corpus.types';

/**
 * Content file path → chapter title, from the book's navigation
 */
export type ChapterMapping = Record<string, string>;

export interface EpubSpineEntry {
  id: string;
  href: string;
  title: string | null;
}

export interface EpubTocEntry {
  href: string;
  title: string;
}

/**
 * Opened EPUB container
 */
export interface EpubBook {
  metadata: Record<string, unknown>;
  spine: EpubSpineEntry[];
  toc: EpubTocEntry[];
  readChapter(id: string): Promise<string>;
}

export interface ChapterDocument {
  id: string;
  href: string;
  // Position in reading order
  order: number;
  html: string;
  navigationTitle: string | null;
}

export interface LoadedBook {
  sourcePath: string;
  metadata: BookMetadata;
  chapters: ChapterDocument[];
  chapterMapping: ChapterMapping | null;
}
