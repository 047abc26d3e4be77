/**
 * Load Stage Orchestrator
 *
 * Responsibilities:
 * - Open the EPUB container
 * - Read book metadata (title, creator, publisher)
 * - Build the navigation chapter mapping
 * - Read every spine document's markup in reading order
 */

import { Injectable, Logger } from '@nestjs/common';
import { basename, extname } from 'path';
import type { BookMetadata } from '../../types/corpus.types';
import { LoadInputDto, LoadOutputDto } from './dto';
import { ChapterDocument, EpubBook } from './types';
import {
  EpubReaderService,
  buildChapterMapping,
  lookupChapterTitle,
} from './services';
import { InvalidInputError, NoChaptersError } from './errors/load-errors';

function metadataString(
  metadata: Record<string, unknown>,
  key: string,
): string | null {
  const value = metadata[key];
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.replace(/\s+/g, ' ').trim();
  return text.length > 0 ? text : null;
}

@Injectable()
export class LoadStage {
  private readonly logger = new Logger(LoadStage.name);

  constructor(private readonly epubReader: EpubReaderService) {}

  async execute(input: LoadInputDto): Promise<LoadOutputDto> {
    const startTime = Date.now();
    this.logger.log(`=== Load Stage Start === File: ${input.filePath}`);

    try {
      this.validateInput(input);

      const epub = await this.epubReader.open(input.filePath);
      const metadata = this.readMetadata(epub, input.filePath);

      const chapterMapping = buildChapterMapping(epub.toc);
      if (!chapterMapping) {
        this.logger.warn(
          `No navigation entries in ${input.filePath}; chapter mapping unavailable`,
        );
      }

      const chapters: ChapterDocument[] = [];
      const skippedChapters: string[] = [];

      for (const [order, entry] of epub.spine.entries()) {
        try {
          const html = await epub.readChapter(entry.id);
          chapters.push({
            id: entry.id,
            href: entry.href,
            order,
            html,
            navigationTitle:
              lookupChapterTitle(chapterMapping, entry.href) ?? entry.title,
          });
        } catch (error) {
          skippedChapters.push(entry.href);
          this.logger.warn(
            `Skipping unreadable chapter ${entry.href}: ` +
              `${error instanceof Error ? error.message : String(error)}`,
          );
        }
      }

      if (chapters.length === 0) {
        throw new NoChaptersError(input.filePath);
      }

      const processingTime = Date.now() - startTime;
      this.logger.log(
        `=== Load Stage Complete === Duration: ${processingTime}ms, ` +
          `Book: "${metadata.title}", Chapters: ${chapters.length}, ` +
          `Skipped: ${skippedChapters.length}`,
      );

      return {
        book: {
          sourcePath: input.filePath,
          metadata,
          chapters,
          chapterMapping,
        },
        skippedChapters,
        processingTime,
      };
    } catch (error) {
      const duration = Date.now() - startTime;
      this.logger.error(
        `=== Load Stage Failed === Duration: ${duration}ms, ` +
          `File: ${input.filePath}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  private validateInput(input: LoadInputDto): void {
    if (!input.filePath || input.filePath.trim().length === 0) {
      throw new InvalidInputError('filePath is required and cannot be empty');
    }

    if (extname(input.filePath).toLowerCase() !== '.epub') {
      throw new InvalidInputError(
        `Unsupported file type: ${input.filePath} is not an .epub file`,
      );
    }
  }

  /**
   * Book title falls back to the file name when the package has none
   */
  private readMetadata(epub: EpubBook, filePath: string): BookMetadata {
    return {
      title:
        metadataString(epub.metadata, 'title') ??
        basename(filePath, extname(filePath)),
      author: metadataString(epub.metadata, 'creator'),
      publisher: metadataString(epub.metadata, 'publisher'),
    };
  }
}
