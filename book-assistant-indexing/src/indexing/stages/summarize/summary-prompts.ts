/**
 * Prompts for the two-pass chapter summary: an outline first, then the
 * outline expanded against the chapter text.
 */

import { PromptTemplate } from '@langchain/core/prompts';

export const SUMMARY_SYSTEM_INSTRUCTIONS = `Adhere to the following formatting rules when creating the outline:
- Start with a top-level header (###) for the text title.
- Use up to five header levels for organization.
- Use hyphens (-) exclusively for bullet points.
- Indent bullet points according to the hierarchy of the Markdown outline.
- Always indent subheaders under headers.
- Never use an introduction sentence (e.g. 'Here is the...') before the outline.
- Only use bullets and headers for formatting.`;

const OUTLINE_INSTRUCTIONS = `Craft a long outline reflecting the main points of a chapter using Markdown formatting. Adhere to these rules:
- Under each header, thoroughly summarize the chapter's topics, key terms, and themes in detail.
- Under the same headers, list pertinent questions raised by the chapter.
The aim is to organize the chapter's essence into relevant, detailed bullet points and questions.`;

const EXPANSION_INSTRUCTIONS = `Using the text provided in the chapter, increase the content of the outline while maintaining the original Markdown formatting. Adhere to these rules:
- Expand each bullet point with detailed explanations and insights based on the chapter's content.
- Answer the questions posed in the outline.
- When appropriate, define terms or concepts.
- Use the chapter for evidence and context.

Outline:`;

const summaryPromptTemplate = PromptTemplate.fromTemplate(
  `{instructions}
{context}
Chapter Text:
\`\`\`
{text}
\`\`\``,
);

export function renderOutlinePrompt(text: string): Promise<string> {
  return summaryPromptTemplate.format({
    instructions: OUTLINE_INSTRUCTIONS,
    context: '',
    text,
  });
}

export function renderExpansionPrompt(
  outline: string,
  text: string,
): Promise<string> {
  return summaryPromptTemplate.format({
    instructions: EXPANSION_INSTRUCTIONS,
    context: outline,
    text,
  });
}
