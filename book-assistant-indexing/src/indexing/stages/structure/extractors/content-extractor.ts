/**
 * Content Extractor
 *
 * Scans one chapter's markup in document order and classifies every
 * structural element into a ContentItem.
 */

import { Injectable } from '@nestjs/common';
import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { ContentItem } from '../types';

const STRUCTURAL_SELECTOR = 'h1, h2, h3, h4, h5, h6, p, img, span, div, li';

const BLOCK_SELECTOR =
  'p, div, li, ul, ol, table, h1, h2, h3, h4, h5, h6, blockquote, section, article';

const TEXT_CONTAINER_SELECTOR = 'p, h1, h2, h3, h4, h5, h6';

// Elements that end a line when the chapter is linearized
const LINE_BREAK_SELECTOR =
  'p, div, li, tr, h1, h2, h3, h4, h5, h6, blockquote, section, article, pre';

const HEADING_TAG = /^h([1-6])$/;
const BLANK_LINE = /\n\s*\n/;

@Injectable()
export class ContentExtractor {
  /**
   * Extract content items from chapter markup
   */
  extractContent(html: string): ContentItem[] {
    const $ = load(html);
    const items: ContentItem[] = [];

    $(STRUCTURAL_SELECTOR).each((_, element) => {
      items.push(...this.classify($, element));
    });

    return items;
  }

  /**
   * Linearize chapter markup into plain text, one block per line
   */
  extractRawText(html: string): string {
    const $ = load(html);

    $('script, style').remove();
    $('br').replaceWith('\n');
    $(LINE_BREAK_SELECTOR).each((_, element) => {
      $(element).append('\n');
    });

    return $('body')
      .text()
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  private classify($: CheerioAPI, element: Element): ContentItem[] {
    const node = $(element);
    const tag = element.tagName.toLowerCase();

    if (tag === 'img') {
      return [
        {
          type: 'image',
          src: node.attr('src') ?? '',
          alt: node.attr('alt') ?? '',
        },
      ];
    }

    if (tag === 'span') {
      const text = node.text().trim();
      if (!text) {
        return [];
      }
      const classes = (node.attr('class') ?? '')
        .split(/\s+/)
        .filter((name) => name.length > 0);
      return [{ type: 'span', classes, text }];
    }

    // Text already captured by an enclosing paragraph or heading
    if (node.parents(TEXT_CONTAINER_SELECTOR).length > 0) {
      return [];
    }

    const headingMatch = HEADING_TAG.exec(tag);
    if (headingMatch) {
      const text = node.text().trim();
      return text
        ? [{ type: 'heading', level: Number(headingMatch[1]), text }]
        : [];
    }

    if (tag === 'p') {
      const text = node.text().trim();
      return text ? [{ type: 'paragraph', text }] : [];
    }

    // div / li: only leaf containers carry implicit paragraphs
    if (this.hasBlockChildren(node)) {
      return [];
    }

    return node
      .text()
      .split(BLANK_LINE)
      .map((piece) => piece.trim())
      .filter((piece) => piece.length > 0)
      .map((text) => ({ type: 'paragraph' as const, text }));
  }

  private hasBlockChildren(node: Cheerio<Element>): boolean {
    return node.find(BLOCK_SELECTOR).length > 0;
  }
}
