/**
 * Chapter Extraction Service
 *
 * Per chapter: Structure → Resolve → compose label → Flatten.
 * Chapters run concurrently in batches of CHAPTER_CONCURRENCY; the result
 * is always in reading order.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ChapterDocument, LoadedBook } from '../load/types';
import { EmptyChapterError, StructureStage } from '../structure';
import type { SectionNode } from '../structure/types';
import { ChapterTitleResolver } from '../resolve';
import { FlattenStage } from '../flatten';
import { CorpusWriterService } from '../persist/services/corpus-writer.service';
import { composeChapterLabel, isTableOfContents } from './chapter-label';
import { ExtractedChapter, ExtractOutput, SkippedChapter } from './types';

type ChapterOutcome =
  | { kind: 'extracted'; chapter: ExtractedChapter }
  | { kind: 'skipped'; skipped: SkippedChapter };

@Injectable()
export class ChapterExtractionService {
  private readonly logger = new Logger(ChapterExtractionService.name);
  private readonly concurrency: number;
  private readonly writeSnapshots: boolean;
  private readonly outputDir: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly structureStage: StructureStage,
    private readonly chapterTitleResolver: ChapterTitleResolver,
    private readonly flattenStage: FlattenStage,
    private readonly corpusWriter: CorpusWriterService,
  ) {
    this.concurrency = Math.max(
      1,
      parseInt(this.configService.get<string>('CHAPTER_CONCURRENCY') ?? '4', 10),
    );
    this.writeSnapshots =
      this.configService.get<string>('WRITE_HIERARCHY_SNAPSHOTS', 'false') ===
      'true';
    this.outputDir = this.configService.get<string>('OUTPUT_DIR', './output');
  }

  async extractBook(book: LoadedBook, outputDir = this.outputDir): Promise<ExtractOutput> {
    const startTime = Date.now();
    const chapters: ExtractedChapter[] = [];
    const skipped: SkippedChapter[] = [];

    this.logger.log(
      `=== Extract Stage Start === "${book.metadata.title}" ` +
        `(${book.chapters.length} chapters, concurrency ${this.concurrency})`,
    );

    for (let i = 0; i < book.chapters.length; i += this.concurrency) {
      const batch = book.chapters.slice(i, i + this.concurrency);
      const outcomes = await Promise.all(
        batch.map((document) => this.extractChapter(book, document, outputDir)),
      );
      for (const outcome of outcomes) {
        if (outcome.kind === 'extracted') {
          chapters.push(outcome.chapter);
        } else {
          skipped.push(outcome.skipped);
        }
      }
    }

    chapters.sort((a, b) => a.order - b.order);
    skipped.sort((a, b) => a.order - b.order);

    const durationMs = Date.now() - startTime;
    const recordCount = chapters.reduce((sum, c) => sum + c.records.length, 0);

    this.logger.log(
      `=== Extract Stage Complete === "${book.metadata.title}": ` +
        `${chapters.length} chapters, ${skipped.length} skipped, ` +
        `${recordCount} paragraphs in ${durationMs}ms`,
    );

    return { chapters, skipped, durationMs };
  }

  private async extractChapter(
    book: LoadedBook,
    document: ChapterDocument,
    outputDir: string,
  ): Promise<ChapterOutcome> {
    const { order, href } = document;

    try {
      const { chapter: structured } = this.structureStage.execute({
        href,
        html: document.html,
      });

      const resolved = await this.chapterTitleResolver.resolve(
        structured.sections,
        structured.rawText,
      );
      const label = composeChapterLabel(resolved, document.navigationTitle);

      if (isTableOfContents(label)) {
        this.logger.debug(`Skipping table of contents at ${href}`);
        return {
          kind: 'skipped',
          skipped: { order, href, reason: 'table_of_contents' },
        };
      }

      if (this.writeSnapshots) {
        await this.writeSnapshot(outputDir, book, document, structured.sections);
      }

      const records = this.flattenStage.execute(structured.sections, {
        chapter: label,
        title: book.metadata.title,
        author: book.metadata.author,
        publisher: book.metadata.publisher,
      });

      return {
        kind: 'extracted',
        chapter: {
          order,
          href,
          chapter: label,
          resolutionSource: resolved.source,
          rawText: structured.rawText,
          records,
        },
      };
    } catch (error) {
      if (error instanceof EmptyChapterError) {
        this.logger.debug(`Skipping empty chapter ${href}`);
        return { kind: 'skipped', skipped: { order, href, reason: 'empty' } };
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `[Extract] stage=extract chapter=${href} status=failed error=${message}`,
      );
      return {
        kind: 'skipped',
        skipped: { order, href, reason: 'failed', message },
      };
    }
  }

  /**
   * A failed snapshot write is logged and the chapter is still flattened
   */
  private async writeSnapshot(
    outputDir: string,
    book: LoadedBook,
    document: ChapterDocument,
    sections: readonly SectionNode[],
  ): Promise<void> {
    try {
      await this.corpusWriter.writeHierarchySnapshot(
        outputDir,
        book.metadata.title,
        document.order,
        sections,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `[Extract] stage=snapshot chapter=${document.href} status=failed error=${message}`,
      );
    }
  }
}
