/**
 * Persist Stage Types
 */

/**
 * Book/chapter index consumed by the chat UI selectors
 */
export interface BookCatalog {
  books: string[];
  chapters: Record<string, string[]>;
}

export const COMBINED_CORPUS_FILE = 'all_books_paragraphs.json';
export const CATALOG_FILE = 'book_index.json';
