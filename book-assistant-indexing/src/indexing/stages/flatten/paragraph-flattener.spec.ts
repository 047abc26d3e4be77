import { flattenHierarchy } from './paragraph-flattener';
import type { SectionNode } from '../structure/types';
import type { ChapterRecordMetadata } from './types';

const countWords = (text: string) =>
  text.split(/\s+/).filter((word) => word.length > 0).length;

const metadata: ChapterRecordMetadata = {
  chapter: 'Chapter 2: The Road',
  title: 'A Test Book',
  author: 'Test Author',
  publisher: null,
};

const hierarchy: SectionNode[] = [
  {
    type: 'section',
    heading: null,
    children: [{ type: 'paragraph', text: 'one two three four' }],
  },
  {
    type: 'section',
    heading: 'The Road',
    children: [
      { type: 'paragraph', text: 'too short' },
      { type: 'image', src: 'map.png', alt: 'Map' },
      {
        type: 'subsection',
        heading: 'Morning',
        children: [
          { type: 'heading', level: 4, text: 'Aside heading words here' },
          { type: 'paragraph', text: 'five words are right here' },
        ],
      },
    ],
  },
  {
    type: 'section',
    heading: 'Evening',
    children: [{ type: 'paragraph', text: 'back to the section level' }],
  },
];

describe('flattenHierarchy', () => {
  it('emits paragraphs with their nearest section and subsection', () => {
    const records = flattenHierarchy(hierarchy, metadata, {
      minParagraphTokens: 4,
      countTokens: countWords,
    });

    expect(records).toEqual([
      {
        type: 'paragraph',
        text: 'one two three four',
        title: 'A Test Book',
        author: 'Test Author',
        publisher: null,
        chapter: 'Chapter 2: The Road',
        section: null,
        subsection: null,
      },
      {
        type: 'paragraph',
        text: 'five words are right here',
        title: 'A Test Book',
        author: 'Test Author',
        publisher: null,
        chapter: 'Chapter 2: The Road',
        section: 'The Road',
        subsection: 'Morning',
      },
      {
        type: 'paragraph',
        text: 'back to the section level',
        title: 'A Test Book',
        author: 'Test Author',
        publisher: null,
        chapter: 'Chapter 2: The Road',
        section: 'Evening',
        subsection: null,
      },
    ]);
  });

  it('keeps a paragraph exactly at the minimum and drops one below it', () => {
    const records = flattenHierarchy(hierarchy, metadata, {
      minParagraphTokens: 5,
      countTokens: countWords,
    });

    expect(records.map((record) => record.text)).toEqual([
      'five words are right here',
      'back to the section level',
    ]);
  });

  it('uses a minimum of 15 tokens by default', () => {
    expect(
      flattenHierarchy(hierarchy, metadata, { countTokens: countWords }),
    ).toEqual([]);
  });

  it('returns identical output on repeated runs', () => {
    const options = { minParagraphTokens: 1, countTokens: countWords };

    expect(flattenHierarchy(hierarchy, metadata, options)).toEqual(
      flattenHierarchy(hierarchy, metadata, options),
    );
  });
});
