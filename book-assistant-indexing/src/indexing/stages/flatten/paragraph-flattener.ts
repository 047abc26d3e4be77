/**
 * Paragraph Flattener
 *
 * Depth-first walk of a chapter hierarchy that emits one ParagraphRecord per
 * paragraph item, labelled with its nearest section and subsection headings.
 */

import type { ParagraphRecord } from '../../types/corpus.types';
import type {
  ContentItem,
  HierarchyNode,
  SectionNode,
} from '../structure/types';
import { ChapterRecordMetadata, FlattenOptions } from './types';

export const DEFAULT_MIN_PARAGRAPH_TOKENS = 15;

interface WalkContext {
  readonly section: string | null;
  readonly subsection: string | null;
}

const ROOT_CONTEXT: WalkContext = { section: null, subsection: null };

export function flattenHierarchy(
  sections: readonly SectionNode[],
  metadata: ChapterRecordMetadata,
  options: FlattenOptions,
): ParagraphRecord[] {
  const minTokens = options.minParagraphTokens ?? DEFAULT_MIN_PARAGRAPH_TOKENS;

  const visit = (
    node: HierarchyNode | ContentItem,
    context: WalkContext,
  ): ParagraphRecord[] => {
    switch (node.type) {
      case 'section': {
        const sectionContext = { section: node.heading, subsection: null };
        return node.children.flatMap((child) => visit(child, sectionContext));
      }
      case 'subsection': {
        const subsectionContext = {
          section: context.section,
          subsection: node.heading,
        };
        return node.children.flatMap((child) =>
          visit(child, subsectionContext),
        );
      }
      case 'paragraph':
        if (options.countTokens(node.text) < minTokens) {
          return [];
        }
        return [
          {
            type: 'paragraph',
            text: node.text,
            title: metadata.title,
            author: metadata.author,
            publisher: metadata.publisher,
            chapter: metadata.chapter,
            section: context.section,
            subsection: context.subsection,
          },
        ];
      default:
        return [];
    }
  };

  return sections.flatMap((section) => visit(section, ROOT_CONTEXT));
}
