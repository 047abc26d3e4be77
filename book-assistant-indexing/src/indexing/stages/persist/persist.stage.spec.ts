import { PersistStage } from './persist.stage';
import { CorpusWriterService } from './services/corpus-writer.service';
import type { EmbeddedChunk } from '../../types/corpus.types';

function chunk(title: string, chapter: string): EmbeddedChunk {
  return {
    type: 'paragraph',
    text: 'text',
    title,
    author: null,
    publisher: null,
    chapter,
    section: null,
    subsection: null,
    embedding: [1, 0],
  };
}

describe('PersistStage', () => {
  const writer = new CorpusWriterService();
  const stage = new PersistStage(writer);

  it('writes one corpus file per book', async () => {
    const spy = jest
      .spyOn(writer, 'writeBookCorpus')
      .mockResolvedValue('/out/Book_paragraphs.json');
    const chunks = [chunk('Book', 'Chapter 1')];

    const result = await stage.execute({ outputDir: '/out', bookTitle: 'Book', chunks });

    expect(spy).toHaveBeenCalledWith('/out', 'Book', chunks);
    expect(result.corpusPath).toBe('/out/Book_paragraphs.json');
    expect(result.chunkCount).toBe(1);
  });

  it('writes the combined corpus and the catalog built from it', async () => {
    const corpusSpy = jest
      .spyOn(writer, 'writeCombinedCorpus')
      .mockResolvedValue('/out/all_books_paragraphs.json');
    const catalogSpy = jest
      .spyOn(writer, 'writeCatalog')
      .mockResolvedValue('/out/book_index.json');
    const chunks = [chunk('B', 'Chapter 10'), chunk('A', 'Chapter 1'), chunk('B', 'Chapter 9')];

    const result = await stage.persistLibrary({ outputDir: '/out', chunks });

    const expectedCatalog = {
      books: ['A', 'B'],
      chapters: { A: ['Chapter 1'], B: ['Chapter 9', 'Chapter 10'] },
    };
    expect(corpusSpy).toHaveBeenCalledWith('/out', chunks);
    expect(catalogSpy).toHaveBeenCalledWith('/out', expectedCatalog);
    expect(result).toEqual({
      corpusPath: '/out/all_books_paragraphs.json',
      catalogPath: '/out/book_index.json',
      catalog: expectedCatalog,
      chunkCount: 3,
    });
  });
});
