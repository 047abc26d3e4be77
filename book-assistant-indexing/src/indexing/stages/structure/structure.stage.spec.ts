import { Test } from '@nestjs/testing';
import { StructureStage } from './structure.stage';
import { StructureStageModule } from './structure-stage.module';
import { EmptyChapterError } from './errors/structure-errors';

describe('StructureStage', () => {
  let stage: StructureStage;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [StructureStageModule],
    }).compile();

    stage = moduleRef.get(StructureStage);
  });

  it('builds a structured chapter with statistics', () => {
    const { chapter } = stage.execute({
      href: 'OEBPS/ch01.xhtml',
      html:
        '<body><h1>Chapter 1</h1><h3>Morning</h3><p>It began at dawn.</p></body>',
    });

    expect(chapter.href).toBe('OEBPS/ch01.xhtml');
    expect(chapter.sections).toEqual([
      {
        type: 'section',
        heading: 'Chapter 1',
        children: [
          {
            type: 'subsection',
            heading: 'Morning',
            children: [{ type: 'paragraph', text: 'It began at dawn.' }],
          },
        ],
      },
    ]);
    expect(chapter.rawText).toBe('Chapter 1\nMorning\nIt began at dawn.');
    expect(chapter.metadata).toEqual({
      contentItemCount: 3,
      totalSections: 1,
      totalSubsections: 1,
      hasHeadings: true,
    });
  });

  it('rejects a chapter with no content', () => {
    expect(() =>
      stage.execute({ href: 'cover.xhtml', html: '<body>  </body>' }),
    ).toThrow(EmptyChapterError);
  });
});
