/**
 * Hierarchy Builder
 *
 * Groups a flat list of content items into Sections (level 1/2 headings)
 * and Subsections (level 3 headings). Levels 4-6 stay plain content.
 */

import { Injectable } from '@nestjs/common';
import { ContentItem, SectionNode, SubsectionNode } from '../types';

@Injectable()
export class HierarchyBuilder {
  /**
   * Build the section tree for one chapter
   *
   * Content seen before any section heading opens an untitled Section.
   */
  buildHierarchy(items: readonly ContentItem[]): SectionNode[] {
    const sections: SectionNode[] = [];
    let currentSection: SectionNode | null = null;
    let currentSubsection: SubsectionNode | null = null;

    for (const item of items) {
      if (item.type === 'heading' && item.level <= 2) {
        if (currentSection) {
          sections.push(currentSection);
        }
        currentSection = { type: 'section', heading: item.text, children: [] };
        currentSubsection = null;
        continue;
      }

      if (item.type === 'heading' && item.level === 3 && currentSection) {
        currentSubsection = {
          type: 'subsection',
          heading: item.text,
          children: [],
        };
        currentSection.children.push(currentSubsection);
        continue;
      }

      if (currentSubsection) {
        currentSubsection.children.push(item);
        continue;
      }

      if (!currentSection) {
        currentSection = { type: 'section', heading: null, children: [] };
      }
      currentSection.children.push(item);
    }

    if (currentSection) {
      sections.push(currentSection);
    }

    return sections;
  }

  countSubsections(sections: readonly SectionNode[]): number {
    return sections.reduce(
      (total, section) =>
        total +
        section.children.filter((child) => child.type === 'subsection').length,
      0,
    );
  }
}
