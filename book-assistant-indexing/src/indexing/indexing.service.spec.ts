import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { IndexingService } from './indexing.service';
import { IndexingWorkflowService } from './workflow/indexing-workflow.service';
import { PersistStage } from './stages/persist';
import { createInitialState } from './workflow/indexing-state';
import { LibraryReadError } from './errors/indexing-errors';
import type { EmbeddedChunk } from './types/corpus.types';

const chunk: EmbeddedChunk = {
  type: 'paragraph',
  text: 'A long walk by the sea.',
  title: 'Sea Book',
  author: null,
  publisher: null,
  chapter: 'Chapter 1',
  section: null,
  subsection: null,
  embedding: [1, 0],
};

describe('IndexingService', () => {
  const workflowService = { executeWorkflow: jest.fn() };
  const persistStage = { persistLibrary: jest.fn() };
  let service: IndexingService;
  let libraryDir: string;

  beforeEach(async () => {
    libraryDir = await mkdtemp(join(tmpdir(), 'indexing-service-'));
    await writeFile(join(libraryDir, 'b-sea.epub'), '');
    await writeFile(join(libraryDir, 'a-broken.EPUB'), '');
    await writeFile(join(libraryDir, 'notes.txt'), '');
    await mkdir(join(libraryDir, 'nested.epub'));

    const moduleRef = await Test.createTestingModule({
      providers: [
        IndexingService,
        { provide: ConfigService, useValue: new ConfigService({ OUTPUT_DIR: '/out' }) },
        { provide: IndexingWorkflowService, useValue: workflowService },
        { provide: PersistStage, useValue: persistStage },
      ],
    }).compile();
    service = moduleRef.get(IndexingService);

    persistStage.persistLibrary.mockResolvedValue({
      corpusPath: '/out/all_books_paragraphs.json',
      catalogPath: '/out/book_index.json',
      catalog: { books: ['Sea Book'], chapters: { 'Sea Book': ['Chapter 1'] } },
      chunkCount: 1,
    });
  });

  afterEach(async () => {
    await rm(libraryDir, { recursive: true, force: true });
  });

  it('indexes each EPUB in order, skipping failed books', async () => {
    workflowService.executeWorkflow.mockImplementation(
      ({ filePath, outputDir }: { filePath: string; outputDir: string }) => {
        if (filePath.endsWith('a-broken.EPUB')) {
          return Promise.reject(new Error('Failed to read EPUB'));
        }
        return Promise.resolve({
          success: true,
          finalState: {
            ...createInitialState({ filePath, outputDir }),
            embeddedChunks: [chunk],
            corpusPath: '/out/Sea_Book_paragraphs.json',
          },
          errors: [],
          metrics: { duration: 1, stagesCompleted: [] },
        });
      },
    );

    const report = await service.indexLibrary({ inputDir: libraryDir });

    expect(workflowService.executeWorkflow.mock.calls.map(([job]) => job)).toEqual([
      { filePath: join(libraryDir, 'a-broken.EPUB'), outputDir: '/out' },
      { filePath: join(libraryDir, 'b-sea.epub'), outputDir: '/out' },
    ]);
    expect(report.books.map(({ success, errors, chunkCount }) => ({
      success,
      errors,
      chunkCount,
    }))).toEqual([
      { success: false, errors: ['Failed to read EPUB'], chunkCount: 0 },
      { success: true, errors: [], chunkCount: 1 },
    ]);
    expect(persistStage.persistLibrary).toHaveBeenCalledWith({
      outputDir: '/out',
      chunks: [chunk],
    });
    expect(report.combinedCorpusPath).toBe('/out/all_books_paragraphs.json');
    expect(report.catalogPath).toBe('/out/book_index.json');
    expect(report.totalChunks).toBe(1);
  });

  it('leaves the combined corpus alone when nothing was indexed', async () => {
    workflowService.executeWorkflow.mockImplementation(
      ({ filePath, outputDir }: { filePath: string; outputDir: string }) =>
        Promise.resolve({
          success: false,
          finalState: createInitialState({ filePath, outputDir }),
          errors: ['No readable chapters'],
          metrics: { duration: 1, stagesCompleted: [] },
        }),
    );

    const report = await service.indexLibrary({ inputDir: libraryDir });

    expect(persistStage.persistLibrary).not.toHaveBeenCalled();
    expect(report.combinedCorpusPath).toBeNull();
    expect(report.books.every((book) => !book.success)).toBe(true);
  });

  it('rejects a missing library directory', async () => {
    await expect(
      service.indexLibrary({ inputDir: join(libraryDir, 'missing') }),
    ).rejects.toBeInstanceOf(LibraryReadError);
  });
});
