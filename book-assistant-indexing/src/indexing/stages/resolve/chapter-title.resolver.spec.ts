import { ConfigService } from '@nestjs/config';
import { ChapterTitleResolver } from './chapter-title.resolver';
import { ChapterHeadingMatcher } from './matchers';
import type {
  TextCompletionOptions,
  TextCompletionProvider,
} from '../../llm/text-completion.provider';
import type { SectionNode } from '../structure/types';

function section(heading: string | null): SectionNode {
  return { type: 'section', heading, children: [] };
}

describe('ChapterTitleResolver', () => {
  let complete: jest.Mock<Promise<string>, [string, TextCompletionOptions?]>;

  function createResolver(config: Record<string, string> = {}) {
    const provider: TextCompletionProvider = { complete };
    return new ChapterTitleResolver(
      new ChapterHeadingMatcher(),
      new ConfigService(config),
      provider,
    );
  }

  beforeEach(() => {
    complete = jest.fn<Promise<string>, [string, TextCompletionOptions?]>();
  });

  it('skips the fallback when headings give chapter and title', async () => {
    const resolver = createResolver();

    await expect(
      resolver.resolve([section('CHAPTER 3. The Beginning')], 'ignored'),
    ).resolves.toEqual({
      chapter: 'Chapter 3',
      title: 'The Beginning',
      source: 'structure',
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it('fills only the missing value from the fallback answer', async () => {
    complete.mockResolvedValue('{"chapter": "Chapter 99", "title": "Low Tide"}');
    const resolver = createResolver();
    const rawText = [
      'Chapter 5',
      '',
      ...Array.from({ length: 12 }, (_, i) => `Line ${i + 1}`),
    ].join('\n');

    const result = await resolver.resolve([section('Chapter 5')], rawText);

    expect(result).toEqual({
      chapter: 'Chapter 5',
      title: 'Low Tide',
      source: 'ai_fallback',
    });

    const [prompt, options] = complete.mock.calls[0];
    expect(prompt).toContain('Chapter 5\nLine 1\n');
    expect(prompt).toContain('Line 9\n');
    expect(prompt).not.toContain('Line 10');
    expect(options?.timeoutMs).toBe(30000);
  });

  it('uses the configured timeout in seconds', async () => {
    complete.mockResolvedValue('{"chapter": null, "title": null}');
    const resolver = createResolver({ CHAPTER_RESOLVER_TIMEOUT: '5' });

    await resolver.resolve([section(null)], 'Some opening text');

    expect(complete.mock.calls[0][1]?.timeoutMs).toBe(5000);
  });

  it('keeps the structural result when the provider fails', async () => {
    complete.mockRejectedValue(new Error('Request timed out.'));
    const resolver = createResolver();

    await expect(
      resolver.resolve([section('Chapter 8')], 'Chapter 8'),
    ).resolves.toEqual({ chapter: 'Chapter 8', title: null, source: 'structure' });
  });

  it('keeps the structural result when the answer is not JSON', async () => {
    complete.mockResolvedValue('No idea, sorry.');
    const resolver = createResolver();

    await expect(
      resolver.resolve([section(null)], 'Opening line'),
    ).resolves.toEqual({ chapter: null, title: null, source: 'none' });
  });

  it('does not call the model when the fallback is disabled', async () => {
    const resolver = createResolver({
      CHAPTER_RESOLVER_FALLBACK_ENABLED: 'false',
    });

    await expect(
      resolver.resolve([section('Prologue')], 'Prologue\nIt was late.'),
    ).resolves.toEqual({ chapter: null, title: 'Prologue', source: 'structure' });
    expect(complete).not.toHaveBeenCalled();
  });

  it('does not call the model for a chapter without text', async () => {
    const resolver = createResolver();

    await resolver.resolve([section(null)], '  \n\n ');

    expect(complete).not.toHaveBeenCalled();
  });
});
