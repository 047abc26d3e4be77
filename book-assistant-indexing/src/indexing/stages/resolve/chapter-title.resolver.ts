/**
 * Chapter/Title Resolver
 *
 * Structural pass over section headings first. When chapter or title is
 * still missing, the opening lines of the chapter are sent to the text
 * completion model and its answer fills the gaps. A failed fallback never
 * throws; the structural result is returned as it is.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { SectionNode } from '../structure/types';
import {
  TEXT_COMPLETION_PROVIDER,
  type TextCompletionProvider,
} from '../../llm/text-completion.provider';
import { ChapterHeadingMatcher } from './matchers';
import { parseChapterTitleResponse } from './parsers';
import { ChapterTitle, ResolvedChapterTitle } from './types';

const SYSTEM_INSTRUCTIONS =
  'You identify chapter numbers and chapter titles in the opening lines of a book chapter. ' +
  'Reply with a single JSON object and nothing else.';

function buildPrompt(lines: string[]): string {
  return `The following are the first lines of a chapter from a book:

${lines.join('\n')}

Return a JSON object of the form {"chapter": "Chapter <number>", "title": "<chapter title>"}.
Use null for a value that does not appear in the text. Do not invent a title.`;
}

@Injectable()
export class ChapterTitleResolver {
  private readonly logger = new Logger(ChapterTitleResolver.name);
  private readonly fallbackEnabled: boolean;
  private readonly timeoutMs: number;
  private readonly maxLines: number;

  constructor(
    private readonly headingMatcher: ChapterHeadingMatcher,
    private readonly configService: ConfigService,
    @Inject(TEXT_COMPLETION_PROVIDER)
    private readonly completionProvider: TextCompletionProvider,
  ) {
    this.fallbackEnabled =
      this.configService.get<string>('CHAPTER_RESOLVER_FALLBACK_ENABLED', 'true') ===
      'true';
    this.timeoutMs =
      parseFloat(
        this.configService.get<string>('CHAPTER_RESOLVER_TIMEOUT') ?? '30',
      ) * 1000;
    this.maxLines = parseInt(
      this.configService.get<string>('CHAPTER_RESOLVER_MAX_LINES') ?? '10',
      10,
    );
  }

  async resolve(
    sections: readonly SectionNode[],
    rawText: string,
  ): Promise<ResolvedChapterTitle> {
    const structural = this.headingMatcher.resolveFromHierarchy(sections);

    if (structural.chapter && structural.title) {
      return { ...structural, source: 'structure' };
    }

    const lines = this.openingLines(rawText);
    if (!this.fallbackEnabled || lines.length === 0) {
      return this.withSource(structural, structural);
    }

    try {
      const response = await this.completionProvider.complete(
        buildPrompt(lines),
        {
          systemInstructions: SYSTEM_INSTRUCTIONS,
          timeoutMs: this.timeoutMs,
        },
      );
      const ai = parseChapterTitleResponse(response);

      const merged: ChapterTitle = {
        chapter: structural.chapter ?? ai.chapter,
        title: structural.title ?? ai.title,
      };

      this.logger.debug(
        `[Resolve] stage=resolve substage=ai_fallback status=completed ` +
          `chapter=${merged.chapter ?? 'null'} title=${merged.title ?? 'null'}`,
      );

      return this.withSource(merged, structural);
    } catch (error) {
      this.logger.warn(
        `[Resolve] stage=resolve substage=ai_fallback status=failed ` +
          `error=${error instanceof Error ? error.message : String(error)}`,
      );
      return this.withSource(structural, structural);
    }
  }

  private openingLines(rawText: string): string[] {
    return rawText
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .slice(0, this.maxLines);
  }

  private withSource(
    result: ChapterTitle,
    structural: ChapterTitle,
  ): ResolvedChapterTitle {
    if (
      result.chapter !== structural.chapter ||
      result.title !== structural.title
    ) {
      return { ...result, source: 'ai_fallback' };
    }
    return {
      ...result,
      source: result.chapter || result.title ? 'structure' : 'none',
    };
  }
}
