/**
 * Resolve Stage Type Definitions
 */

export interface ChapterTitle {
  chapter: string | null;
  title: string | null;
}

export type ResolutionSource = 'structure' | 'ai_fallback' | 'none';

export interface ResolvedChapterTitle extends ChapterTitle {
  source: ResolutionSource;
}
