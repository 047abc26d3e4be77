/**
 * Runtime schemas for the JSON files written by the indexing service
 */

import { z } from 'zod';

const nullableText = z.string().nullable().default(null);

const recordBase = {
  text: z.string(),
  title: z.string(),
  author: nullableText,
  publisher: nullableText,
  chapter: nullableText,
  embedding: z.array(z.number()).min(1),
};

export const embeddedChunkSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('paragraph'),
    ...recordBase,
    section: nullableText,
    subsection: nullableText,
  }),
  z.object({
    type: z.literal('summary'),
    ...recordBase,
  }),
]);

export const corpusSchema = z.array(embeddedChunkSchema);

export const catalogSchema = z.object({
  books: z.array(z.string()),
  chapters: z.record(z.array(z.string())),
});
