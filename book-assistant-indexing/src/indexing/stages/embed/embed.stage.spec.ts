import { ConfigService } from '@nestjs/config';
import { FakeEmbeddings } from '@langchain/core/utils/testing';
import { EmbedStage } from './embed.stage';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { EmbeddingGenerationService } from './embedding-generation.service';
import { EmbeddingFailedError } from './errors';
import type { CorpusRecord, ParagraphRecord } from '../../types/corpus.types';

class SelectiveEmbeddings extends FakeEmbeddings {
  async embedQuery(text: string): Promise<number[]> {
    if (text.includes('fail')) {
      throw new Error('rate limited');
    }
    return super.embedQuery(text);
  }
}

function paragraph(text: string): ParagraphRecord {
  return {
    type: 'paragraph',
    text,
    title: 'Test Book',
    author: null,
    publisher: null,
    chapter: 'Chapter 1',
    section: null,
    subsection: null,
  };
}

describe('EmbedStage', () => {
  let stage: EmbedStage;

  beforeEach(() => {
    const configService = new ConfigService({
      EMBEDDING_PROVIDER: 'ollama',
      EMBEDDING_MAX_RETRIES: '1',
      EMBEDDING_BATCH_SIZE: '2',
    });
    const factory = new EmbeddingProviderFactory(configService);
    jest
      .spyOn(factory, 'createEmbeddingModel')
      .mockReturnValue(new SelectiveEmbeddings());

    stage = new EmbedStage(
      factory,
      new EmbeddingGenerationService(factory, configService),
    );
  });

  it('embeds records in order and leaves out failures', async () => {
    const records: CorpusRecord[] = [
      paragraph('first text'),
      paragraph('please fail here'),
      {
        type: 'summary',
        text: 'chapter summary',
        title: 'Test Book',
        author: null,
        publisher: null,
        chapter: 'Chapter 1',
      },
    ];

    const { chunks, metadata } = await stage.execute({
      bookTitle: 'Test Book',
      records,
    });

    expect(chunks).toEqual([
      { ...records[0], embedding: [0.1, 0.2, 0.3, 0.4] },
      { ...records[2], embedding: [0.1, 0.2, 0.3, 0.4] },
    ]);
    expect(metadata).toMatchObject({
      modelId: 'ollama/bge-m3:567m',
      dimensions: 4,
      totalRecords: 3,
      embeddedCount: 2,
      failedCount: 1,
    });
  });

  it('fails the book when nothing could be embedded', async () => {
    await expect(
      stage.execute({
        bookTitle: 'Test Book',
        records: [paragraph('fail one'), paragraph('fail two')],
      }),
    ).rejects.toThrow(EmbeddingFailedError);
  });

  it('returns an empty result for a book without records', async () => {
    const { chunks } = await stage.execute({ bookTitle: 'Empty', records: [] });

    expect(chunks).toEqual([]);
  });
});
