import { ConfigService } from '@nestjs/config';
import { ChapterSummarizerService } from './chapter-summarizer.service';
import type { TextCompletionOptions } from '../../llm/text-completion.provider';
import type { BookMetadata } from '../../types/corpus.types';

const book: BookMetadata = {
  title: 'Test Book',
  author: 'Test Author',
  publisher: 'Test Press',
};

const longText = 'The river rose through the night and the town woke to water. '.repeat(3);

describe('ChapterSummarizerService', () => {
  let complete: jest.Mock<Promise<string>, [string, TextCompletionOptions?]>;

  function createService(enabled = 'true') {
    return new ChapterSummarizerService(
      new ConfigService({ SUMMARY_GENERATION_ENABLED: enabled }),
      { complete },
    );
  }

  beforeEach(() => {
    complete = jest.fn<Promise<string>, [string, TextCompletionOptions?]>();
  });

  it('outlines the chapter and then expands the outline', async () => {
    complete
      .mockResolvedValueOnce('### Outline')
      .mockResolvedValueOnce('### Expanded summary');
    const service = createService();

    const summary = await service.summarizeChapter(
      { chapter: 'Chapter 1: Flood', text: longText },
      book,
    );

    expect(summary).toEqual({
      type: 'summary',
      text: '### Expanded summary',
      title: 'Test Book',
      author: 'Test Author',
      publisher: 'Test Press',
      chapter: 'Chapter 1: Flood',
    });
    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[0][0]).toContain(
      'Chapter Text:\n```\n' + longText.trim() + '\n```',
    );
    expect(complete.mock.calls[1][0]).toContain(
      'Outline:\n### Outline\nChapter Text:',
    );
    expect(complete.mock.calls[1][1]?.timeoutMs).toBe(120000);
  });

  it('skips chapters shorter than 100 characters', async () => {
    const service = createService();

    await expect(
      service.summarizeChapter({ chapter: null, text: 'Too short.' }, book),
    ).resolves.toBeNull();
    expect(complete).not.toHaveBeenCalled();
  });

  it('returns null when the model fails', async () => {
    complete.mockRejectedValue(new Error('quota exceeded'));
    const service = createService();

    await expect(
      service.summarizeChapter({ chapter: 'Chapter 2', text: longText }, book),
    ).resolves.toBeNull();
  });

  it('summarizes a whole book in chapter order', async () => {
    complete.mockImplementation(async (prompt) =>
      prompt.includes('Outline:') ? 'expanded' : 'outline',
    );
    const service = createService();

    const summaries = await service.summarizeBook(
      [
        { chapter: 'Chapter 1', text: longText },
        { chapter: 'Chapter 2', text: 'short' },
        { chapter: 'Chapter 3', text: longText },
        { chapter: 'Chapter 4', text: longText },
      ],
      book,
    );

    expect(summaries.map((summary) => summary.chapter)).toEqual([
      'Chapter 1',
      'Chapter 3',
      'Chapter 4',
    ]);
  });

  it('produces nothing when disabled', async () => {
    const service = createService('false');

    await expect(
      service.summarizeBook([{ chapter: 'Chapter 1', text: longText }], book),
    ).resolves.toEqual([]);
    expect(service.isEnabled()).toBe(false);
  });
});
