/**
 * Criteria Filter
 *
 * Narrows a corpus to records matching ANY of the constraint sets, where a
 * set matches when ALL of its active constraints hold. A constraint is
 * inactive when its value is null/undefined or its field is not mapped.
 */

import type {
  ConstraintSet,
  EmbeddedChunk,
  FieldMapping,
  FilterField,
} from '../types';

export const DEFAULT_FIELD_MAPPING: Readonly<Required<FieldMapping>> = {
  book: 'title',
  chapter: 'chapter',
  author: 'author',
  type: 'type',
};

const FILTER_FIELDS: readonly FilterField[] = ['book', 'chapter', 'author', 'type'];

function matchesSet(
  record: EmbeddedChunk,
  constraints: ConstraintSet,
  mapping: FieldMapping,
): boolean {
  return FILTER_FIELDS.every((field) => {
    const expected = constraints[field];
    const recordField = mapping[field];
    if (expected === null || expected === undefined || !recordField) {
      return true;
    }
    return record[recordField] === expected;
  });
}

export function filterByCriteria<T extends EmbeddedChunk>(
  corpus: readonly T[],
  constraintSets: readonly ConstraintSet[],
  fieldMapping: FieldMapping = DEFAULT_FIELD_MAPPING,
): T[] {
  if (constraintSets.length === 0) {
    return [...corpus];
  }

  return corpus.filter((record) =>
    constraintSets.some((constraints) =>
      matchesSet(record, constraints, fieldMapping),
    ),
  );
}
