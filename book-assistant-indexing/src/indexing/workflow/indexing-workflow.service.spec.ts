import { Test } from '@nestjs/testing';
import { IndexingWorkflowService } from './indexing-workflow.service';
import { LoadStage } from '../stages/load';
import { ChapterExtractionService } from '../stages/extract';
import { ChapterSummarizerService } from '../stages/summarize';
import { EmbedStage } from '../stages/embed';
import { PersistStage } from '../stages/persist';
import type { LoadedBook } from '../stages/load/types';
import type { ExtractedChapter } from '../stages/extract/types';
import type { ParagraphRecord } from '../types/corpus.types';

const book: LoadedBook = {
  sourcePath: '/library/river.epub',
  metadata: { title: 'River Book', author: 'Test Author', publisher: null },
  chapters: [],
  chapterMapping: null,
};

const paragraph: ParagraphRecord = {
  type: 'paragraph',
  text: 'The river ran high that spring.',
  title: 'River Book',
  author: 'Test Author',
  publisher: null,
  chapter: 'Chapter 1: Spring',
  section: null,
  subsection: null,
};

const chapter: ExtractedChapter = {
  order: 0,
  href: 'ch1.xhtml',
  chapter: 'Chapter 1: Spring',
  resolutionSource: 'structure',
  rawText: 'Chapter 1\nSpring',
  records: [paragraph],
};

describe('IndexingWorkflowService', () => {
  const loadStage = { execute: jest.fn() };
  const extractionService = { extractBook: jest.fn() };
  const summarizer = { isEnabled: jest.fn(), summarizeBook: jest.fn() };
  const embedStage = { execute: jest.fn() };
  const persistStage = { execute: jest.fn() };
  let service: IndexingWorkflowService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        IndexingWorkflowService,
        { provide: LoadStage, useValue: loadStage },
        { provide: ChapterExtractionService, useValue: extractionService },
        { provide: ChapterSummarizerService, useValue: summarizer },
        { provide: EmbedStage, useValue: embedStage },
        { provide: PersistStage, useValue: persistStage },
      ],
    }).compile();

    service = moduleRef.get(IndexingWorkflowService);

    loadStage.execute.mockResolvedValue({
      book,
      skippedChapters: [],
      processingTime: 1,
    });
    extractionService.extractBook.mockResolvedValue({
      chapters: [chapter],
      skipped: [],
      durationMs: 1,
    });
    summarizer.isEnabled.mockReturnValue(false);
    embedStage.execute.mockResolvedValue({
      chunks: [{ ...paragraph, embedding: [0.5, 0.5] }],
      metadata: {
        provider: 'ollama',
        model: 'bge-m3:567m',
        modelId: 'ollama/bge-m3:567m',
        dimensions: 2,
        totalRecords: 1,
        embeddedCount: 1,
        failedCount: 0,
        durationMs: 1,
      },
    });
    persistStage.execute.mockResolvedValue({
      corpusPath: '/out/River_Book_paragraphs.json',
      chunkCount: 1,
      durationMs: 1,
    });
  });

  it('runs every stage for a book and reports the corpus path', async () => {
    const result = await service.executeWorkflow({
      filePath: '/library/river.epub',
      outputDir: '/out',
    });

    expect(result.success).toBe(true);
    expect(result.metrics.stagesCompleted).toEqual([
      'load',
      'extract',
      'summarize',
      'embed',
      'persist',
    ]);
    expect(result.finalState.corpusPath).toBe('/out/River_Book_paragraphs.json');
    expect(extractionService.extractBook).toHaveBeenCalledWith(book, '/out');
    expect(embedStage.execute).toHaveBeenCalledWith({
      bookTitle: 'River Book',
      records: [paragraph],
    });
    expect(summarizer.summarizeBook).not.toHaveBeenCalled();
  });

  it('embeds chapter summaries after the paragraphs when enabled', async () => {
    const summary = {
      type: 'summary' as const,
      text: 'A spring flood.',
      title: 'River Book',
      author: 'Test Author',
      publisher: null,
      chapter: 'Chapter 1: Spring',
    };
    summarizer.isEnabled.mockReturnValue(true);
    summarizer.summarizeBook.mockResolvedValue([summary]);

    await service.executeWorkflow({ filePath: '/library/river.epub', outputDir: '/out' });

    expect(summarizer.summarizeBook).toHaveBeenCalledWith(
      [{ chapter: 'Chapter 1: Spring', text: 'Chapter 1\nSpring' }],
      book.metadata,
    );
    expect(embedStage.execute).toHaveBeenCalledWith({
      bookTitle: 'River Book',
      records: [paragraph, summary],
    });
  });

  it('stops after a failed load', async () => {
    loadStage.execute.mockRejectedValue(new Error('File not found at path: /missing.epub'));

    const result = await service.executeWorkflow({
      filePath: '/missing.epub',
      outputDir: '/out',
    });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['File not found at path: /missing.epub']);
    expect(result.finalState.currentStage).toBe('load_failed');
    expect(extractionService.extractBook).not.toHaveBeenCalled();
  });

  it('does not persist a book whose embedding failed', async () => {
    embedStage.execute.mockRejectedValue(new Error('embedding provider down'));

    const result = await service.executeWorkflow({
      filePath: '/library/river.epub',
      outputDir: '/out',
    });

    expect(result.success).toBe(false);
    expect(result.metrics.stagesCompleted).toEqual(['load', 'extract', 'summarize']);
    expect(persistStage.execute).not.toHaveBeenCalled();
  });

  it('fails a book that yields no paragraphs', async () => {
    extractionService.extractBook.mockResolvedValue({
      chapters: [],
      skipped: [],
      durationMs: 1,
    });

    const result = await service.executeWorkflow({
      filePath: '/library/river.epub',
      outputDir: '/out',
    });

    expect(result.errors).toEqual(['No paragraphs extracted from "River Book"']);
    expect(embedStage.execute).not.toHaveBeenCalled();
  });
});
