/**
 * Criteria filter types
 */

import type { CorpusField } from './corpus.types';

export type FilterField = 'book' | 'chapter' | 'author' | 'type';

/**
 * Filter field → value; null or missing values impose no constraint
 */
export type ConstraintSet = Partial<Record<FilterField, string | null>>;

/**
 * Filter field → corpus record field
 */
export type FieldMapping = Partial<Record<FilterField, CorpusField>>;
