/**
 * Chapter mapping helpers
 *
 * Navigation entries often point at anchors inside a content file
 * (`text/ch01.xhtml#sec2`) and may be percent-encoded. Spine entries point at
 * whole files, so the mapping is keyed by decoded base path.
 */

import { ChapterMapping, EpubTocEntry } from '../types';

export function stripFragment(path: string): string {
  const hashIndex = path.indexOf('#');
  return hashIndex === -1 ? path : path.slice(0, hashIndex);
}

export function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    // Malformed escape sequence: the raw path is the best key available
    return path;
  }
}

/**
 * Collapse `path#anchor` keys onto their base path, first title wins
 */
export function eliminateFragments(mapping: ChapterMapping): ChapterMapping {
  const collapsed: ChapterMapping = {};
  for (const [path, title] of Object.entries(mapping)) {
    const basePath = stripFragment(path);
    if (!Object.hasOwn(collapsed, basePath)) {
      collapsed[basePath] = title;
    }
  }
  return collapsed;
}

/**
 * Decode percent-encoded paths, first title wins on collisions
 */
export function decodeChapterPaths(mapping: ChapterMapping): ChapterMapping {
  const decoded: ChapterMapping = {};
  for (const [path, title] of Object.entries(mapping)) {
    const decodedPath = decodePath(path);
    if (!Object.hasOwn(decoded, decodedPath)) {
      decoded[decodedPath] = title;
    }
  }
  return decoded;
}

/**
 * Build the mapping from navigation entries, null when there are none
 */
export function buildChapterMapping(
  toc: readonly EpubTocEntry[],
): ChapterMapping | null {
  if (toc.length === 0) {
    return null;
  }

  const raw: ChapterMapping = {};
  for (const entry of toc) {
    if (!Object.hasOwn(raw, entry.href)) {
      raw[entry.href] = entry.title;
    }
  }

  return decodeChapterPaths(eliminateFragments(raw));
}

export function lookupChapterTitle(
  mapping: ChapterMapping | null,
  href: string,
): string | null {
  if (!mapping) {
    return null;
  }
  const key = decodePath(stripFragment(href));
  return Object.hasOwn(mapping, key) ? mapping[key] : null;
}
