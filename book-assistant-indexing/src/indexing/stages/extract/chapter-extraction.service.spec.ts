import { ConfigService } from '@nestjs/config';
import { ChapterExtractionService } from './chapter-extraction.service';
import { StructureStage } from '../structure/structure.stage';
import { ContentExtractor } from '../structure/extractors';
import { HierarchyBuilder } from '../structure/builders';
import { ChapterTitleResolver } from '../resolve/chapter-title.resolver';
import { ChapterHeadingMatcher } from '../resolve/matchers';
import { FlattenStage } from '../flatten/flatten.stage';
import { TokenCounterService } from '../flatten/services';
import { CorpusWriterService } from '../persist/services/corpus-writer.service';
import type { ChapterDocument, LoadedBook } from '../load/types';
import type { TextCompletionOptions } from '../../llm/text-completion.provider';

function document(
  order: number,
  html: string,
  navigationTitle: string | null = null,
): ChapterDocument {
  return {
    id: `item${order}`,
    href: `OEBPS/ch${order}.xhtml`,
    order,
    html,
    navigationTitle,
  };
}

function book(chapters: ChapterDocument[]): LoadedBook {
  return {
    sourcePath: '/library/river.epub',
    metadata: { title: 'River Book', author: 'Test Author', publisher: null },
    chapters,
    chapterMapping: null,
  };
}

describe('ChapterExtractionService', () => {
  const complete = jest.fn<Promise<string>, [string, TextCompletionOptions?]>();
  const writer = new CorpusWriterService();
  const tokenCounter = new TokenCounterService();

  function createService(config: Record<string, string> = {}) {
    const configService = new ConfigService({
      CHAPTER_RESOLVER_FALLBACK_ENABLED: 'false',
      MIN_PARAGRAPH_TOKENS: '1',
      CHAPTER_CONCURRENCY: '2',
      ...config,
    });
    const flattenStage = new FlattenStage(configService, tokenCounter);
    const service = new ChapterExtractionService(
      configService,
      new StructureStage(new ContentExtractor(), new HierarchyBuilder()),
      new ChapterTitleResolver(new ChapterHeadingMatcher(), configService, {
        complete,
      }),
      flattenStage,
      writer,
    );
    return { service, flattenStage };
  }

  it('extracts labelled paragraphs in reading order and skips non-content chapters', async () => {
    const { service } = createService();

    const result = await service.extractBook(
      book([
        document(0, '<body><h1>Table of Contents</h1><p>Chapter One</p></body>'),
        document(
          1,
          '<body><h1>Chapter 1</h1><h2>The Start</h2><p>Some words here.</p></body>',
        ),
        document(2, '<body></body>'),
        document(3, '<body><p>Untitled closing prose.</p></body>', 'Epilogue'),
      ]),
    );

    expect(result.chapters.map(({ order, chapter, resolutionSource }) => ({
      order,
      chapter,
      resolutionSource,
    }))).toEqual([
      { order: 1, chapter: 'Chapter 1: The Start', resolutionSource: 'structure' },
      { order: 3, chapter: 'Epilogue', resolutionSource: 'none' },
    ]);
    expect(result.chapters[0].records).toEqual([
      {
        type: 'paragraph',
        text: 'Some words here.',
        title: 'River Book',
        author: 'Test Author',
        publisher: null,
        chapter: 'Chapter 1: The Start',
        section: 'The Start',
        subsection: null,
      },
    ]);
    expect(result.skipped).toEqual([
      { order: 0, href: 'OEBPS/ch0.xhtml', reason: 'table_of_contents' },
      { order: 2, href: 'OEBPS/ch2.xhtml', reason: 'empty' },
    ]);
    expect(complete).not.toHaveBeenCalled();
  });

  it('records a failing chapter as skipped and keeps going', async () => {
    const { service, flattenStage } = createService();
    jest.spyOn(flattenStage, 'execute').mockImplementationOnce(() => {
      throw new Error('tokenizer unavailable');
    });

    const result = await service.extractBook(
      book([document(0, '<body><h1>Chapter 4</h1><p>Body text.</p></body>')]),
    );

    expect(result.chapters).toEqual([]);
    expect(result.skipped).toEqual([
      {
        order: 0,
        href: 'OEBPS/ch0.xhtml',
        reason: 'failed',
        message: 'tokenizer unavailable',
      },
    ]);
  });

  it('writes hierarchy snapshots when enabled', async () => {
    const snapshot = jest
      .spyOn(writer, 'writeHierarchySnapshot')
      .mockResolvedValue('/out/River_Book_hierarchy_1.json');
    const { service } = createService({ WRITE_HIERARCHY_SNAPSHOTS: 'true' });

    await service.extractBook(
      book([document(0, '<body><h1>Chapter 4</h1><p>Body text.</p></body>')]),
      '/out',
    );

    expect(snapshot).toHaveBeenCalledWith('/out', 'River Book', 0, [
      {
        type: 'section',
        heading: 'Chapter 4',
        children: [{ type: 'paragraph', text: 'Body text.' }],
      },
    ]);
    snapshot.mockRestore();
  });

  it('keeps the chapter when its snapshot cannot be written', async () => {
    const snapshot = jest
      .spyOn(writer, 'writeHierarchySnapshot')
      .mockRejectedValue(new Error('EACCES: permission denied'));
    const { service } = createService({ WRITE_HIERARCHY_SNAPSHOTS: 'true' });

    const result = await service.extractBook(
      book([document(0, '<body><h1>Chapter 4</h1><p>Body text.</p></body>')]),
      '/out',
    );

    expect(result.skipped).toEqual([]);
    expect(result.chapters.map((chapter) => chapter.chapter)).toEqual([
      'Chapter 4',
    ]);
    expect(result.chapters[0].records.map((record) => record.text)).toEqual([
      'Body text.',
    ]);
    snapshot.mockRestore();
  });
});
