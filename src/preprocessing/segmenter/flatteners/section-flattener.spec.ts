import type { Section } from '../../types';
import { SectionFlattener } from './section-flattener';

const section = (title: string, subsections: Section[] = []): Section => ({
  title,
  level: 1,
  content: '',
  pageRange: { start: 1, end: 1 },
  subsections,
});

describe('SectionFlattener', () => {
  const flattener = new SectionFlattener();
  const tree = [
    section('A', [section('A.1', [section('A.1.a')]), section('A.2')]),
    section('B'),
  ];

  it('lists sections in pre-order', () => {
    expect(flattener.flatten(tree).map((s) => s.title)).toEqual([
      'A',
      'A.1',
      'A.1.a',
      'A.2',
      'B',
    ]);
  });

  it('returns the original section objects', () => {
    expect(flattener.flatten(tree)[1]).toBe(tree[0].subsections[0]);
  });

  it('finds a section by title ignoring case', () => {
    expect(flattener.findByTitle(tree, 'a.1.A')).toBe(
      tree[0].subsections[0].subsections[0],
    );
    expect(flattener.findByTitle(tree, 'missing')).toBeUndefined();
  });
});
