import type { SourceChunk } from '../types';

export const NO_INFORMATION_MESSAGE =
  'I could not find any information about that in the selected books.';

export const ANSWER_FAILURE_MESSAGE = 'Sorry, I could not answer that question.';

export const ANSWER_SYSTEM_PROMPT = `Use numbered references (e.g. [1]) to cite the sources that are given to you in your answers.
List the references used at the bottom of your answer.
Use MLA Citation Style that references the chapter.
Do not refer to the source material in your text, only in your number citations.
Give a detailed answer.`;

function orUnknown(value: string | null): string {
  return value ?? 'Unknown';
}

export function formatSource(source: SourceChunk, index: number): string {
  return [
    `[${index + 1}]`,
    `Book: *${source.title}*`,
    `Chapter: ${orUnknown(source.chapter)}`,
    `Author: ${orUnknown(source.author)}`,
    `Publisher: ${orUnknown(source.publisher)}`,
    '',
    `Text: ${source.text}`,
  ].join('\n');
}

export function formatSources(sources: readonly SourceChunk[]): string {
  return sources.map(formatSource).join('\n\n');
}
