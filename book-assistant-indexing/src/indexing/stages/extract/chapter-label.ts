/**
 * Chapter label composition
 */

import type { ChapterTitle } from '../resolve/types';

const TABLE_OF_CONTENTS = /^(?:table\s+of\s+)?contents$/i;

/**
 * Combine resolved chapter and title into the label stored on records.
 * The navigation title is used when neither was resolved.
 */
export function composeChapterLabel(
  resolved: ChapterTitle,
  navigationTitle: string | null,
): string | null {
  const { chapter, title } = resolved;
  if (chapter && title) {
    return `${chapter}: ${title}`;
  }
  return chapter ?? title ?? navigationTitle;
}

export function isTableOfContents(label: string | null): boolean {
  return label !== null && TABLE_OF_CONTENTS.test(label.trim());
}
