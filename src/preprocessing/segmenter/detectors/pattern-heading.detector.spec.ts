import { PatternHeadingDetector } from './pattern-heading.detector';

describe('PatternHeadingDetector', () => {
  const detector = new PatternHeadingDetector();

  it.each([
    ['1. Introduction', 1, 'Introduction'],
    ['2.3 Scope', 2, 'Scope'],
    ['2.3. Scope', 2, 'Scope'],
    ['1.2.3 Details', 3, 'Details'],
    ['1.2.3. Details', 3, 'Details'],
    ['# Overview', 1, 'Overview'],
    ['### Notes', 3, 'Notes'],
    ['가. 개요', 1, '개요'],
    ['[4] References', 1, 'References'],
    ['  1.  Padded  ', 1, 'Padded'],
  ])('matches "%s" as level %i', (text, level, title) => {
    expect(detector.match(text)).toEqual({ level, title });
  });

  it.each(['Introduction', '1.Intro', '####### Too deep', '2024 results', '', '   '])(
    'does not match "%s"',
    (text) => {
      expect(detector.match(text)).toBeNull();
    },
  );

  describe('determineLevel', () => {
    it('counts numbering components', () => {
      expect(detector.determineLevel('4')).toBe(1);
      expect(detector.determineLevel('4.1')).toBe(2);
      expect(detector.determineLevel('4.1.7')).toBe(3);
    });

    it('counts markup hashes', () => {
      expect(detector.determineLevel('####')).toBe(4);
    });

    it('treats letters as level 1', () => {
      expect(detector.determineLevel('나')).toBe(1);
    });
  });
});
