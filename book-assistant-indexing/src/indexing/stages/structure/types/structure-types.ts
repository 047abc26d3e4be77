/**
 * Structure Stage Type Definitions
 *
 * A chapter document is scanned into ContentItems, then grouped into
 * Sections (level 1/2 headings) and Subsections (level 3 headings).
 */

/**
 * Content items extracted from chapter markup
 */
export interface HeadingItem {
  type: 'heading';
  level: number; // 1-6
  text: string;
}

export interface ParagraphItem {
  type: 'paragraph';
  text: string;
}

export interface ImageItem {
  type: 'image';
  src: string;
  alt: string;
}

export interface SpanItem {
  type: 'span';
  classes: string[];
  text: string;
}

export type ContentItem = HeadingItem | ParagraphItem | ImageItem | SpanItem;

/**
 * Hierarchy nodes
 * A subsection only ever holds content items (max depth 2 below the chapter).
 */
export interface SubsectionNode {
  type: 'subsection';
  heading: string;
  children: ContentItem[];
}

export interface SectionNode {
  type: 'section';
  heading: string | null;
  children: Array<SubsectionNode | ContentItem>;
}

export type HierarchyNode = SectionNode | SubsectionNode;

/**
 * Structured chapter (final output of the stage)
 */
export interface StructuredChapter {
  href: string;
  sections: SectionNode[];
  rawText: string;
  metadata: {
    contentItemCount: number;
    totalSections: number;
    totalSubsections: number;
    hasHeadings: boolean;
  };
}
