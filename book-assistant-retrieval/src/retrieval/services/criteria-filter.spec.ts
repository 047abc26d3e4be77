import { DEFAULT_FIELD_MAPPING, filterByCriteria } from './criteria-filter';
import type { EmbeddedChunk } from '../types';

function chunk(
  title: string,
  chapter: string | null,
  type: 'paragraph' | 'summary' = 'paragraph',
): EmbeddedChunk {
  const base = {
    text: `${title} ${chapter ?? ''}`,
    title,
    author: 'Test Author',
    publisher: null,
    chapter,
    embedding: [1, 0],
  };
  return type === 'paragraph'
    ? { ...base, type, section: null, subsection: null }
    : { ...base, type };
}

describe('filterByCriteria', () => {
  const a1 = chunk('A', '1');
  const a2 = chunk('A', '2');
  const b1 = chunk('B', '1');
  const corpus = [a1, a2, b1];

  it('keeps records matching all constraints of any set', () => {
    expect(
      filterByCriteria(corpus, [{ book: 'A', chapter: '1' }, { book: 'B' }], {
        book: 'title',
        chapter: 'chapter',
      }),
    ).toEqual([a1, b1]);
  });

  it('returns the corpus unchanged when there are no constraint sets', () => {
    const result = filterByCriteria(corpus, []);

    expect(result).toEqual(corpus);
    expect(result[0]).toBe(a1);
    expect(result).not.toBe(corpus);
  });

  it('ignores null values and unmapped fields', () => {
    expect(
      filterByCriteria(corpus, [{ book: 'A', chapter: null, author: 'Nobody' }], {
        book: 'title',
      }),
    ).toEqual([a1, a2]);
  });

  it('treats a set with only inactive constraints as matching everything', () => {
    expect(filterByCriteria(corpus, [{ chapter: null }])).toEqual(corpus);
  });

  it('filters on record type through the default mapping', () => {
    const summary = chunk('A', '1', 'summary');

    expect(
      filterByCriteria([a1, summary, b1], [{ type: 'summary' }], DEFAULT_FIELD_MAPPING),
    ).toEqual([summary]);
  });

  it('returns nothing when no set matches', () => {
    expect(filterByCriteria(corpus, [{ book: 'C' }])).toEqual([]);
  });
});
