/**
 * Composite Heading Detector
 *
 * Runs both heading signals per span in document order:
 * numbering/markup patterns first, font size as the fallback.
 */

import { Injectable, Logger } from '@nestjs/common';
import type { Heading, SegmentationOptions, TextSpan } from '../../types';
import { FontSizeHeadingDetector } from './font-size-heading.detector';
import { PatternHeadingDetector } from './pattern-heading.detector';

export interface HeadingDetectionOutput {
  headings: Heading[];
  averageFontSize: number;
  patternHeadings: number;
  fontSizeHeadings: number;
}

@Injectable()
export class CompositeHeadingDetector {
  private readonly logger = new Logger(CompositeHeadingDetector.name);

  constructor(
    private readonly patternDetector: PatternHeadingDetector,
    private readonly fontSizeDetector: FontSizeHeadingDetector,
  ) {}

  /**
   * Detect headings in a document-order span stream
   *
   * @param spans - All spans of the document, in order
   * @param options - Font size thresholds
   */
  detect(spans: TextSpan[], options: SegmentationOptions): HeadingDetectionOutput {
    const averageFontSize = this.fontSizeDetector.calculateAverageFontSize(spans);
    this.logger.debug(`Average font size: ${averageFontSize.toFixed(2)}`);

    const headings: Heading[] = [];
    let patternHeadings = 0;
    let fontSizeHeadings = 0;

    spans.forEach((span, spanIndex) => {
      if (span.text.trim().length === 0) {
        return;
      }

      const byPattern = this.patternDetector.match(span.text);
      if (byPattern) {
        headings.push({
          spanIndex,
          page: span.page,
          title: byPattern.title,
          level: byPattern.level,
          source: 'pattern',
          fontSize: span.fontSize,
        });
        patternHeadings++;
        return;
      }

      const byFontSize = this.fontSizeDetector.match(
        span,
        averageFontSize,
        options,
      );
      if (byFontSize) {
        headings.push({
          spanIndex,
          page: span.page,
          title: byFontSize.title,
          level: byFontSize.level,
          source: 'font-size',
          fontSize: span.fontSize,
        });
        fontSizeHeadings++;
      }
    });

    this.logger.log(
      `Detected ${headings.length} headings (pattern: ${patternHeadings}, font size: ${fontSizeHeadings})`,
    );

    return { headings, averageFontSize, patternHeadings, fontSizeHeadings };
  }
}
