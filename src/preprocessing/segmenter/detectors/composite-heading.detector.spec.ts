import { Test, TestingModule } from '@nestjs/testing';
import { DEFAULT_PREPROCESS_OPTIONS } from '../../constants/preprocess-defaults';
import type { TextSpan } from '../../types';
import { CompositeHeadingDetector } from './composite-heading.detector';
import { FontSizeHeadingDetector } from './font-size-heading.detector';
import { PatternHeadingDetector } from './pattern-heading.detector';

describe('CompositeHeadingDetector', () => {
  let detector: CompositeHeadingDetector;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CompositeHeadingDetector,
        PatternHeadingDetector,
        FontSizeHeadingDetector,
      ],
    }).compile();

    detector = module.get<CompositeHeadingDetector>(CompositeHeadingDetector);
  });

  it('prefers numbering patterns and falls back to font size', () => {
    const spans: TextSpan[] = [
      { page: 1, text: '1. Intro', fontSize: 10 },
      { page: 1, text: 'Body text', fontSize: 10 },
      { page: 2, text: 'Overview', fontSize: 20 },
      { page: 2, text: 'more', fontSize: 10 },
    ];

    const result = detector.detect(spans, DEFAULT_PREPROCESS_OPTIONS);

    expect(result.averageFontSize).toBe(12.5);
    expect(result.patternHeadings).toBe(1);
    expect(result.fontSizeHeadings).toBe(1);
    expect(result.headings).toEqual([
      {
        spanIndex: 0,
        page: 1,
        title: 'Intro',
        level: 1,
        source: 'pattern',
        fontSize: 10,
      },
      {
        spanIndex: 2,
        page: 2,
        title: 'Overview',
        level: 2,
        source: 'font-size',
        fontSize: 20,
      },
    ]);
  });

  it('skips blank spans', () => {
    const spans: TextSpan[] = [
      { page: 1, text: '   ', fontSize: 40 },
      { page: 1, text: 'body', fontSize: 10 },
    ];

    expect(detector.detect(spans, DEFAULT_PREPROCESS_OPTIONS).headings).toEqual([]);
  });
});
