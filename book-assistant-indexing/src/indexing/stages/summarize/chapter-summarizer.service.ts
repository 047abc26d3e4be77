/**
 * Chapter Summarizer Service
 * Generates one summary record per chapter with the text completion model.
 * Failures are logged and the chapter is skipped.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  BookMetadata,
  ChapterSummary,
} from '../../types/corpus.types';
import {
  TEXT_COMPLETION_PROVIDER,
  type TextCompletionProvider,
} from '../../llm/text-completion.provider';
import {
  SUMMARY_SYSTEM_INSTRUCTIONS,
  renderExpansionPrompt,
  renderOutlinePrompt,
} from './summary-prompts';

// Chapters shorter than this carry nothing worth summarizing
export const MIN_SUMMARY_SOURCE_CHARS = 100;

export interface ChapterText {
  chapter: string | null;
  text: string;
}

@Injectable()
export class ChapterSummarizerService {
  private readonly logger = new Logger(ChapterSummarizerService.name);
  private readonly enabled: boolean;
  private readonly timeoutMs: number;
  private readonly batchSize: number;

  constructor(
    private readonly configService: ConfigService,
    @Inject(TEXT_COMPLETION_PROVIDER)
    private readonly completionProvider: TextCompletionProvider,
  ) {
    this.enabled =
      this.configService.get<string>('SUMMARY_GENERATION_ENABLED', 'false') ===
      'true';
    this.timeoutMs =
      parseInt(this.configService.get<string>('SUMMARY_TIMEOUT') ?? '120', 10) *
      1000;
    this.batchSize = Math.max(
      1,
      parseInt(this.configService.get<string>('SUMMARY_BATCH_SIZE') ?? '3', 10),
    );

    if (!this.enabled) {
      this.logger.log('Summary generation is disabled');
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  async summarizeChapter(
    chapter: ChapterText,
    book: BookMetadata,
  ): Promise<ChapterSummary | null> {
    const text = chapter.text.trim();
    if (text.length < MIN_SUMMARY_SOURCE_CHARS) {
      return null;
    }

    const startTime = Date.now();
    const options = {
      systemInstructions: SUMMARY_SYSTEM_INSTRUCTIONS,
      timeoutMs: this.timeoutMs,
    };

    try {
      const outline = await this.completionProvider.complete(
        await renderOutlinePrompt(text),
        options,
      );
      const summary = await this.completionProvider.complete(
        await renderExpansionPrompt(outline, text),
        options,
      );

      this.logger.debug(
        `Summarized ${chapter.chapter ?? 'untitled chapter'} of "${book.title}" ` +
          `in ${Date.now() - startTime}ms`,
      );

      return {
        type: 'summary',
        text: summary,
        title: book.title,
        author: book.author,
        publisher: book.publisher,
        chapter: chapter.chapter,
      };
    } catch (error) {
      this.logger.warn(
        `Summary failed for ${chapter.chapter ?? 'untitled chapter'} of "${book.title}": ` +
          `${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }

  /**
   * Summarize every chapter of a book in batches, keeping chapter order
   */
  async summarizeBook(
    chapters: ChapterText[],
    book: BookMetadata,
  ): Promise<ChapterSummary[]> {
    if (!this.enabled) {
      return [];
    }

    const summaries: ChapterSummary[] = [];

    for (let i = 0; i < chapters.length; i += this.batchSize) {
      const batch = chapters.slice(i, i + this.batchSize);
      const results = await Promise.all(
        batch.map((chapter) => this.summarizeChapter(chapter, book)),
      );
      for (const summary of results) {
        if (summary) {
          summaries.push(summary);
        }
      }
    }

    this.logger.log(
      `Summary generation completed for "${book.title}": ` +
        `${summaries.length}/${chapters.length} chapters`,
    );

    return summaries;
  }
}
