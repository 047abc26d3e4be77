/**
 * Indexing Service
 * Runs the per-book workflow over every EPUB in a directory, one book at a
 * time, then writes the combined corpus and the book/chapter catalog.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readdir } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { IndexingWorkflowService } from './workflow/indexing-workflow.service';
import { PersistStage } from './stages/persist';
import type { EmbeddedChunk } from './types/corpus.types';
import { LibraryReadError } from './errors/indexing-errors';
import type {
  BookIndexingReport,
  IndexLibraryDto,
  IndexingReportDto,
} from './dto';

@Injectable()
export class IndexingService {
  private readonly logger = new Logger(IndexingService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly workflowService: IndexingWorkflowService,
    private readonly persistStage: PersistStage,
  ) {}

  async indexLibrary(request: IndexLibraryDto = {}): Promise<IndexingReportDto> {
    const startTime = Date.now();
    const inputDir = resolve(
      request.inputDir ?? this.configService.get<string>('INPUT_DIR', './books'),
    );
    const outputDir = resolve(
      request.outputDir ?? this.configService.get<string>('OUTPUT_DIR', './output'),
    );

    const files = await this.listEpubFiles(inputDir);
    this.logger.log(`Indexing ${files.length} EPUB files from ${inputDir}`);

    const books: BookIndexingReport[] = [];
    const allChunks: EmbeddedChunk[] = [];

    for (const filePath of files) {
      const { report, chunks } = await this.indexBook(filePath, outputDir);
      books.push(report);
      allChunks.push(...chunks);
    }

    let combinedCorpusPath: string | null = null;
    let catalogPath: string | null = null;

    if (allChunks.length > 0) {
      const persisted = await this.persistStage.persistLibrary({
        outputDir,
        chunks: allChunks,
      });
      combinedCorpusPath = persisted.corpusPath;
      catalogPath = persisted.catalogPath;
    } else {
      this.logger.warn(
        `No chunks produced from ${inputDir}; combined corpus left untouched`,
      );
    }

    const failed = books.filter((book) => !book.success);
    const durationMs = Date.now() - startTime;

    this.logger.log(
      `Library indexing finished: ${books.length - failed.length}/${books.length} books, ` +
        `${allChunks.length} chunks in ${durationMs}ms`,
    );
    if (failed.length > 0) {
      this.logger.warn(
        `Failed books: ${failed.map((book) => book.filePath).join(', ')}`,
      );
    }

    return {
      inputDir,
      outputDir,
      books,
      combinedCorpusPath,
      catalogPath,
      totalChunks: allChunks.length,
      durationMs,
    };
  }

  private async indexBook(
    filePath: string,
    outputDir: string,
  ): Promise<{ report: BookIndexingReport; chunks: EmbeddedChunk[] }> {
    const startTime = Date.now();

    try {
      const result = await this.workflowService.executeWorkflow({
        filePath,
        outputDir,
      });
      const { finalState } = result;
      const chunks = result.success ? finalState.embeddedChunks : [];

      return {
        chunks,
        report: {
          filePath,
          title: finalState.book?.metadata.title ?? null,
          success: result.success,
          corpusPath: finalState.corpusPath,
          chunkCount: chunks.length,
          skippedChapters: finalState.skippedChapters,
          errors: result.errors,
          durationMs: Date.now() - startTime,
        },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Indexing failed for ${filePath}: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );

      return {
        chunks: [],
        report: {
          filePath,
          title: null,
          success: false,
          corpusPath: null,
          chunkCount: 0,
          skippedChapters: [],
          errors: [message],
          durationMs: Date.now() - startTime,
        },
      };
    }
  }

  private async listEpubFiles(inputDir: string): Promise<string[]> {
    try {
      const entries = await readdir(inputDir, { withFileTypes: true });
      return entries
        .filter(
          (entry) =>
            entry.isFile() && extname(entry.name).toLowerCase() === '.epub',
        )
        .map((entry) => join(inputDir, entry.name))
        .sort();
    } catch (error) {
      throw new LibraryReadError(
        inputDir,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
