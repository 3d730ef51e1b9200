/**
 * Font Size Heading Detector
 *
 * Fallback signal when no numbering pattern matches: a span whose font is
 * noticeably larger than the document average is treated as a heading.
 */

import { Injectable } from '@nestjs/common';
import { DEFAULT_FONT_SIZE } from '../../constants/preprocess-defaults';
import type { SegmentationOptions, TextSpan } from '../../types';
import type { HeadingMatch } from './pattern-heading.detector';

// ratio to average font size → heading level
const LEVEL_BANDS: ReadonlyArray<{ minRatio: number; level: number }> = [
  { minRatio: 1.8, level: 1 },
  { minRatio: 1.5, level: 2 },
  { minRatio: 1.2, level: 3 },
];
const LOWEST_LEVEL = 4;

@Injectable()
export class FontSizeHeadingDetector {
  /**
   * Average over spans that carry a positive font size
   */
  calculateAverageFontSize(spans: TextSpan[]): number {
    let total = 0;
    let count = 0;

    for (const span of spans) {
      if (this.hasFontSize(span)) {
        total += span.fontSize;
        count++;
      }
    }

    return count > 0 ? total / count : DEFAULT_FONT_SIZE;
  }

  match(
    span: TextSpan,
    averageFontSize: number,
    options: SegmentationOptions,
  ): HeadingMatch | null {
    const title = span.text.trim();
    if (title.length === 0 || !this.hasFontSize(span)) {
      return null;
    }

    if (span.fontSize < options.minHeadingFontSize) {
      return null;
    }

    const ratio = span.fontSize / averageFontSize;
    if (ratio < options.fontSizeRatioThreshold) {
      return null;
    }

    return { level: this.inferLevel(ratio), title };
  }

  inferLevel(ratio: number): number {
    const band = LEVEL_BANDS.find((b) => ratio >= b.minRatio);
    return band ? band.level : LOWEST_LEVEL;
  }

  private hasFontSize(span: TextSpan): span is TextSpan & { fontSize: number } {
    return typeof span.fontSize === 'number' && span.fontSize > 0;
  }
}
