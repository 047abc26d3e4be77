/**
 * Flatten Stage Type Definitions
 */

export interface ChapterRecordMetadata {
  chapter: string | null;
  // Book title
  title: string;
  author: string | null;
  publisher: string | null;
}

export interface FlattenOptions {
  minParagraphTokens?: number;
  countTokens: (text: string) => number;
}
