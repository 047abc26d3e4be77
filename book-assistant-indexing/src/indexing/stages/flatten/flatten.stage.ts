/**
 * Flatten Stage
 * Turns a resolved chapter hierarchy into paragraph records.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ParagraphRecord } from '../../types/corpus.types';
import type { SectionNode } from '../structure/types';
import { TokenCounterService } from './services';
import {
  DEFAULT_MIN_PARAGRAPH_TOKENS,
  flattenHierarchy,
} from './paragraph-flattener';
import { ChapterRecordMetadata } from './types';

@Injectable()
export class FlattenStage {
  private readonly logger = new Logger(FlattenStage.name);
  private readonly minParagraphTokens: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly tokenCounter: TokenCounterService,
  ) {
    this.minParagraphTokens = parseInt(
      this.configService.get<string>('MIN_PARAGRAPH_TOKENS') ??
        String(DEFAULT_MIN_PARAGRAPH_TOKENS),
      10,
    );
  }

  execute(
    sections: readonly SectionNode[],
    metadata: ChapterRecordMetadata,
  ): ParagraphRecord[] {
    const records = flattenHierarchy(sections, metadata, {
      minParagraphTokens: this.minParagraphTokens,
      countTokens: (text) => this.tokenCounter.countTokens(text),
    });

    this.logger.debug(
      `Flattened ${metadata.chapter ?? 'untitled chapter'}: ${records.length} paragraphs ` +
        `(min ${this.minParagraphTokens} tokens)`,
    );

    return records;
  }
}
