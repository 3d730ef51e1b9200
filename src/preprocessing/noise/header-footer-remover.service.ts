/**
 * Header/Footer Remover Service
 *
 * Detects text that recurs in the top or bottom band of many pages
 * (running headers, footers, page numbers) and strips it from every page.
 */

import { Injectable, Logger } from '@nestjs/common';
import { DEFAULT_PREPROCESS_OPTIONS } from '../constants/preprocess-defaults';
import { NoiseRemovalError, PreprocessError, toError } from '../errors';
import type {
  NoiseRemovalOptions,
  NoiseRemovalResult,
  Page,
  TextSpan,
} from '../types';
import { isPageNumber } from './page-number-patterns';
import { characterSetSimilarity } from './text-similarity';

type Band = 'top' | 'bottom';

@Injectable()
export class HeaderFooterRemoverService {
  private readonly logger = new Logger(HeaderFooterRemoverService.name);

  /**
   * Detect header/footer patterns and remove matching spans
   *
   * @param pages - Normalized pages in document order
   * @param options - Repetition, band and similarity thresholds
   * @returns Cleaned pages plus the detected patterns
   */
  remove(
    pages: Page[],
    options: NoiseRemovalOptions = DEFAULT_PREPROCESS_OPTIONS,
  ): NoiseRemovalResult {
    try {
      this.logger.log(
        `Detecting headers/footers across ${pages.length} pages ` +
          `(minRepetition: ${options.minRepetition}, band: ${options.positionThreshold}pt)`,
      );

      // Repetition cannot be established on fewer pages
      if (pages.length < options.minRepetition) {
        this.logger.log(
          `Only ${pages.length} pages (< ${options.minRepetition}), skipping header/footer detection`,
        );
        return {
          pages: pages.map((page) => ({
            pageNumber: page.pageNumber,
            spans: [...page.spans],
          })),
          headerPatterns: [],
          footerPatterns: [],
          removedSpanCount: 0,
        };
      }

      const headerPatterns = this.detectPatterns(pages, 'top', options);
      const footerPatterns = this.detectPatterns(pages, 'bottom', options);

      this.logger.log(
        `Detected ${headerPatterns.length} header patterns and ${footerPatterns.length} footer patterns`,
      );

      const patterns = Array.from(
        new Set([...headerPatterns, ...footerPatterns]),
      );

      let removedSpanCount = 0;
      const cleanedPages = pages.map((page) => {
        const spans = page.spans.filter(
          (span) => !this.isNoise(span, patterns, options.similarityThreshold),
        );
        removedSpanCount += page.spans.length - spans.length;
        return { pageNumber: page.pageNumber, spans };
      });

      this.logger.log(`Removed ${removedSpanCount} header/footer spans`);

      return {
        pages: cleanedPages,
        headerPatterns,
        footerPatterns,
        removedSpanCount,
      };
    } catch (error) {
      if (error instanceof PreprocessError) {
        throw error;
      }
      const err = toError(error);
      this.logger.error(`Header/footer removal failed: ${err.message}`);
      throw new NoiseRemovalError(err.message, err);
    }
  }

  /**
   * Find band texts repeated on at least minRepetition distinct pages,
   * plus any band text shaped like a page number
   *
   * @returns Patterns in first-seen document order
   */
  detectPatterns(
    pages: Page[],
    band: Band,
    options: NoiseRemovalOptions,
  ): string[] {
    if (pages.length < options.minRepetition) {
      return [];
    }

    // text → number of distinct pages it appears on
    const pageCounts = new Map<string, number>();

    for (const page of pages) {
      const texts = new Set(this.getBandTexts(page, band, options));
      for (const text of texts) {
        pageCounts.set(text, (pageCounts.get(text) ?? 0) + 1);
      }
    }

    const patterns: string[] = [];
    for (const [text, count] of pageCounts) {
      if (count >= options.minRepetition || isPageNumber(text)) {
        patterns.push(text);
      }
    }

    this.logger.debug(`Detected ${band} patterns: ${JSON.stringify(patterns)}`);

    return patterns;
  }

  /**
   * Trimmed, non-empty texts of positioned spans inside a page band.
   * Bottom band is measured from the lowest span observed on that page.
   */
  getBandTexts(page: Page, band: Band, options: NoiseRemovalOptions): string[] {
    const positioned = page.spans.filter(
      (span): span is TextSpan & { yPosition: number } =>
        typeof span.yPosition === 'number',
    );

    if (positioned.length === 0) {
      return [];
    }

    let inBand: (y: number) => boolean;
    if (band === 'top') {
      inBand = (y) => y <= options.positionThreshold;
    } else {
      const maxY = positioned.reduce(
        (max, span) => Math.max(max, span.yPosition),
        0,
      );
      const bottomThreshold = maxY - options.positionThreshold;
      inBand = (y) => y >= bottomThreshold;
    }

    return positioned
      .filter((span) => inBand(span.yPosition))
      .map((span) => span.text.trim())
      .filter((text) => text.length > 0);
  }

  private isNoise(
    span: TextSpan,
    patterns: string[],
    similarityThreshold: number,
  ): boolean {
    const text = span.text.trim();
    if (text.length === 0) {
      return false;
    }

    return patterns.some(
      (pattern) =>
        pattern === text ||
        characterSetSimilarity(text, pattern) >= similarityThreshold,
    );
  }
}
