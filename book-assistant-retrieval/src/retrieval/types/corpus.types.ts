/**
 * Corpus record types
 * Field names follow the corpus JSON written by the indexing service.
 */

export interface ParagraphChunk {
  type: 'paragraph';
  text: string;
  title: string;
  author: string | null;
  publisher: string | null;
  chapter: string | null;
  section: string | null;
  subsection: string | null;
  embedding: number[];
}

export interface SummaryChunk {
  type: 'summary';
  text: string;
  title: string;
  author: string | null;
  publisher: string | null;
  chapter: string | null;
  embedding: number[];
}

export type EmbeddedChunk = ParagraphChunk | SummaryChunk;

/**
 * Scalar fields shared by every corpus record
 */
export type CorpusField = Exclude<keyof EmbeddedChunk, 'embedding'>;

export type ScoredChunk = EmbeddedChunk & { similarity: number };

export type SourceChunk =
  | (Omit<ParagraphChunk, 'embedding'> & { similarity: number })
  | (Omit<SummaryChunk, 'embedding'> & { similarity: number });

/**
 * Book/chapter index used by the chat UI selectors
 */
export interface BookCatalog {
  books: string[];
  chapters: Record<string, string[]>;
}
