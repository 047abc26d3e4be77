/**
 * Chapter Heading Matcher
 *
 * Structural pass of the chapter/title resolver: reads the chapter number and
 * title from section headings, then from a `heading_break1` span.
 */

import { Injectable } from '@nestjs/common';
import type { ContentItem, SectionNode } from '../../structure/types';
import { ChapterTitle } from '../types';
import { getNumberWordPattern, toChapterNumber } from './number-words';

const CHAPTER_KEYWORD = String.raw`C\s*H\s*A\s*P\s*T\s*E\s*R`;
const TITLE_SPAN_CLASS = 'heading_break1';
// Period, colon, hyphen, en or em dash after the chapter number
const NUMBER_SEPARATOR = String.raw`\s*[.:\-\u2013\u2014]?`;

let chapterRegex: RegExp | null = null;
let chapterPrefixRegex: RegExp | null = null;

function numberToken(): string {
  return String.raw`\d+|\b(?:${getNumberWordPattern()})\b`;
}

function getChapterRegex(): RegExp {
  if (!chapterRegex) {
    chapterRegex = new RegExp(
      String.raw`(?:${CHAPTER_KEYWORD}|^)\s*(${numberToken()})${NUMBER_SEPARATOR}`,
      'i',
    );
  }
  return chapterRegex;
}

function getChapterPrefixRegex(): RegExp {
  if (!chapterPrefixRegex) {
    chapterPrefixRegex = new RegExp(
      String.raw`^(?:${CHAPTER_KEYWORD})?\s*(?:${numberToken()})${NUMBER_SEPARATOR}\s*`,
      'i',
    );
  }
  return chapterPrefixRegex;
}

export interface ChapterHeadingMatch {
  chapter: string;
  // The heading holds nothing but the chapter token
  headingIsChapterOnly: boolean;
}

@Injectable()
export class ChapterHeadingMatcher {
  /**
   * Match a chapter number in one normalized heading
   */
  matchHeading(heading: string): ChapterHeadingMatch | null {
    const match = getChapterRegex().exec(heading);
    if (!match) {
      return null;
    }

    const token = match[1];
    return {
      chapter: `Chapter ${toChapterNumber(token) ?? token}`,
      headingIsChapterOnly:
        heading.toLowerCase() === match[0].trim().toLowerCase(),
    };
  }

  /**
   * Heading with any leading "CHAPTER n." or "Chapter n:" removed,
   * null when nothing is left
   */
  stripChapterPrefix(heading: string): string | null {
    const title = heading.replace(getChapterPrefixRegex(), '').trim();
    return title.length > 0 ? title : null;
  }

  resolveFromHierarchy(sections: readonly SectionNode[]): ChapterTitle {
    let chapter: string | null = null;
    let title: string | null = null;

    for (const section of sections) {
      if (section.heading === null) {
        continue;
      }

      const heading = section.heading.replace(/\s+/g, ' ').trim();
      const match = this.matchHeading(heading);

      if (match) {
        chapter = match.chapter;
        if (match.headingIsChapterOnly) {
          continue;
        }
      }

      if (!title) {
        title = this.stripChapterPrefix(heading);
      }

      if (chapter && title) {
        break;
      }
    }

    return { chapter, title: title ?? this.findTitleSpan(sections) };
  }

  private findTitleSpan(sections: readonly SectionNode[]): string | null {
    for (const section of sections) {
      for (const child of section.children) {
        const items: readonly ContentItem[] =
          child.type === 'subsection' ? child.children : [child];

        for (const item of items) {
          if (
            item.type === 'span' &&
            item.classes.includes(TITLE_SPAN_CLASS) &&
            item.text.trim().length > 0
          ) {
            return item.text.trim();
          }
        }
      }
    }
    return null;
  }
}
