/**
 * Corpus record types shared by the indexing stages.
 * Field names follow the persisted corpus JSON.
 */

/**
 * Book-level metadata carried by every record
 */
export interface BookMetadata {
  title: string;
  author: string | null;
  publisher: string | null;
}

/**
 * Flattened paragraph with its structural back-references
 */
export interface ParagraphRecord {
  type: 'paragraph';
  text: string;
  title: string;
  author: string | null;
  publisher: string | null;
  chapter: string | null;
  section: string | null;
  subsection: string | null;
}

/**
 * Chapter summary produced by the summarize stage
 */
export interface ChapterSummary {
  type: 'summary';
  text: string;
  title: string;
  author: string | null;
  publisher: string | null;
  chapter: string | null;
}

export type CorpusRecord = ParagraphRecord | ChapterSummary;

export type EmbeddedChunk = CorpusRecord & {
  embedding: number[];
};
