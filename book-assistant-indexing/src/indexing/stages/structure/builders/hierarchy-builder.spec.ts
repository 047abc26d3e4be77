import { HierarchyBuilder } from './hierarchy-builder';
import { ContentItem } from '../types';

describe('HierarchyBuilder', () => {
  const builder = new HierarchyBuilder();

  it('opens a section per level 1/2 heading and a subsection per level 3 heading', () => {
    const items: ContentItem[] = [
      { type: 'heading', level: 1, text: 'Chapter 1' },
      { type: 'paragraph', text: 'Opening.' },
      { type: 'heading', level: 3, text: 'Part A' },
      { type: 'paragraph', text: 'In part A.' },
      { type: 'heading', level: 2, text: 'Second' },
      { type: 'paragraph', text: 'In second.' },
    ];

    expect(builder.buildHierarchy(items)).toEqual([
      {
        type: 'section',
        heading: 'Chapter 1',
        children: [
          { type: 'paragraph', text: 'Opening.' },
          {
            type: 'subsection',
            heading: 'Part A',
            children: [{ type: 'paragraph', text: 'In part A.' }],
          },
        ],
      },
      {
        type: 'section',
        heading: 'Second',
        children: [{ type: 'paragraph', text: 'In second.' }],
      },
    ]);
  });

  it('yields one untitled section when there are no headings', () => {
    const items: ContentItem[] = [
      { type: 'paragraph', text: 'One.' },
      { type: 'image', src: 'a.png', alt: '' },
    ];

    expect(builder.buildHierarchy(items)).toEqual([
      { type: 'section', heading: null, children: items },
    ]);
  });

  it('treats a level 3 heading with no open section as content', () => {
    const items: ContentItem[] = [
      { type: 'heading', level: 3, text: 'Orphan' },
      { type: 'paragraph', text: 'After.' },
    ];

    const sections = builder.buildHierarchy(items);

    expect(sections).toEqual([
      { type: 'section', heading: null, children: items },
    ]);
    expect(builder.countSubsections(sections)).toBe(0);
  });

  it('keeps levels 4-6 inside the open subsection', () => {
    const items: ContentItem[] = [
      { type: 'heading', level: 2, text: 'Section' },
      { type: 'heading', level: 3, text: 'Sub' },
      { type: 'heading', level: 5, text: 'Minor' },
      { type: 'heading', level: 3, text: 'Sub 2' },
    ];

    const sections = builder.buildHierarchy(items);

    expect(sections).toEqual([
      {
        type: 'section',
        heading: 'Section',
        children: [
          {
            type: 'subsection',
            heading: 'Sub',
            children: [{ type: 'heading', level: 5, text: 'Minor' }],
          },
          { type: 'subsection', heading: 'Sub 2', children: [] },
        ],
      },
    ]);
    expect(builder.countSubsections(sections)).toBe(2);
  });

  it('returns an empty list for empty input', () => {
    expect(builder.buildHierarchy([])).toEqual([]);
  });
});
