/**
 * Catalog builder
 * Book titles and, per book, its chapter labels in natural order
 * ("Chapter 2" before "Chapter 10").
 */

import type { CorpusRecord } from '../../../types/corpus.types';
import { BookCatalog } from '../types';

const naturalOrder = new Intl.Collator(undefined, {
  numeric: true,
  sensitivity: 'base',
});

export function buildCatalog(records: readonly CorpusRecord[]): BookCatalog {
  const chaptersByBook = new Map<string, Set<string>>();

  for (const record of records) {
    let chapters = chaptersByBook.get(record.title);
    if (!chapters) {
      chapters = new Set();
      chaptersByBook.set(record.title, chapters);
    }
    if (record.chapter) {
      chapters.add(record.chapter);
    }
  }

  const books = [...chaptersByBook.keys()].sort(naturalOrder.compare);
  const chapters: Record<string, string[]> = {};
  for (const book of books) {
    chapters[book] = [...(chaptersByBook.get(book) ?? [])].sort(
      naturalOrder.compare,
    );
  }

  return { books, chapters };
}
