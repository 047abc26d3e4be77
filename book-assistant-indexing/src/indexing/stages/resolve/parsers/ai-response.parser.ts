/**
 * AI Response Parser
 * Turns the fallback model's reply into a ChapterTitle.
 */

import { z } from 'zod';
import { ChapterTitle } from '../types';
import { AiResponseParseError } from '../errors/resolve-errors';
import { toChapterNumber } from '../matchers/number-words';

const aiChapterTitleSchema = z.object({
  chapter: z.union([z.string(), z.number()]).nullable().optional(),
  title: z.union([z.string(), z.number()]).nullable().optional(),
});

const CODE_FENCE = /```(?:json)?/gi;
const JSON_OBJECT = /\{[\s\S]*\}/;
// String literals match first so the words inside them are left alone
const STRING_OR_BARE_NULL = /"(?:[^"\\]|\\.)*"|:\s*(?:None|null|NULL|Null)\b/g;
const NULL_WORDS = new Set(['', 'null', 'none', 'n/a', 'unknown']);

function normalizeChapter(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? `Chapter ${value}` : null;
  }

  const text = value.replace(/\s+/g, ' ').trim();
  if (NULL_WORDS.has(text.toLowerCase())) {
    return null;
  }

  const number = toChapterNumber(text);
  return number ? `Chapter ${number}` : text;
}

function normalizeTitle(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).replace(/\s+/g, ' ').trim();
  return NULL_WORDS.has(text.toLowerCase()) ? null : text;
}

/**
 * Parse a `{"chapter": ..., "title": ...}` reply
 *
 * @throws AiResponseParseError when no valid object can be read
 */
export function parseChapterTitleResponse(raw: string): ChapterTitle {
  const block = JSON_OBJECT.exec(raw.replace(CODE_FENCE, ''));
  if (!block) {
    throw new AiResponseParseError('no JSON object found', raw);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(
      block[0].replace(STRING_OR_BARE_NULL, (token) =>
        token.startsWith('"') ? token : ': null',
      ),
    );
  } catch (error) {
    throw new AiResponseParseError(
      'invalid JSON',
      raw,
      error instanceof Error ? error : undefined,
    );
  }

  const result = aiChapterTitleSchema.safeParse(parsed);
  if (!result.success) {
    throw new AiResponseParseError(result.error.message, raw);
  }

  return {
    chapter: normalizeChapter(result.data.chapter),
    title: normalizeTitle(result.data.title),
  };
}
