/**
 * Structure Stage Orchestrator
 *
 * Indexing pipeline per book:
 * Load → (per chapter: Structure → Resolve → Flatten) → Summarize → Embed → Persist
 *
 * Responsibilities:
 * - Classify chapter markup into content items
 * - Build the section/subsection hierarchy
 * - Linearize the chapter text for the resolver fallback and summaries
 */

import { Injectable, Logger } from '@nestjs/common';
import { StructureInputDto, StructureOutputDto } from './dto';
import { ContentExtractor } from './extractors';
import { HierarchyBuilder } from './builders';
import { EmptyChapterError } from './errors/structure-errors';

@Injectable()
export class StructureStage {
  private readonly logger = new Logger(StructureStage.name);

  constructor(
    private readonly contentExtractor: ContentExtractor,
    private readonly hierarchyBuilder: HierarchyBuilder,
  ) {}

  /**
   * Execute Structure Stage for one chapter document
   *
   * @throws EmptyChapterError when the markup holds no content
   */
  execute(input: StructureInputDto): StructureOutputDto {
    const startTime = Date.now();

    this.logger.debug(`=== Structure Stage Start === Chapter: ${input.href}`);

    const items = this.contentExtractor.extractContent(input.html);
    if (items.length === 0) {
      throw new EmptyChapterError(input.href);
    }

    const sections = this.hierarchyBuilder.buildHierarchy(items);
    const rawText = this.contentExtractor.extractRawText(input.html);
    const processingTime = Date.now() - startTime;

    this.logger.debug(
      `=== Structure Stage Complete === Chapter: ${input.href}, ` +
        `Items: ${items.length}, Sections: ${sections.length}, ` +
        `Duration: ${processingTime}ms`,
    );

    return {
      chapter: {
        href: input.href,
        sections,
        rawText,
        metadata: {
          contentItemCount: items.length,
          totalSections: sections.length,
          totalSubsections: this.hierarchyBuilder.countSubsections(sections),
          hasHeadings: items.some((item) => item.type === 'heading'),
        },
      },
      processingTime,
    };
  }
}
