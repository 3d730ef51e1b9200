/**
 * Section Segmenter Service
 *
 * Turns the cleaned, per-page span stream into a heading tree:
 * detect headings → build tree (or single fallback section) → validate.
 * Never returns an empty list when at least one span is non-blank.
 */

import { Injectable, Logger } from '@nestjs/common';
import { DEFAULT_PREPROCESS_OPTIONS } from '../constants/preprocess-defaults';
import { PreprocessError, SegmentationError, toError } from '../errors';
import type {
  Page,
  PreprocessWarning,
  SegmentationOptions,
  SegmentationResult,
  TextSpan,
} from '../types';
import { HierarchyValidator, TreeConstructor } from './builders';
import { CompositeHeadingDetector } from './detectors';

@Injectable()
export class SectionSegmenterService {
  private readonly logger = new Logger(SectionSegmenterService.name);

  constructor(
    private readonly headingDetector: CompositeHeadingDetector,
    private readonly treeConstructor: TreeConstructor,
    private readonly hierarchyValidator: HierarchyValidator,
  ) {}

  /**
   * Segment pages into top-level sections with nested subsections
   *
   * @param pages - Denoised pages, numbered 1..N
   * @param options - Font size heading thresholds
   * @throws SegmentationError on page contract violations or internal failure
   */
  segment(
    pages: Page[],
    options: SegmentationOptions = DEFAULT_PREPROCESS_OPTIONS,
  ): SegmentationResult {
    try {
      this.logger.log(`Starting section segmentation for ${pages.length} pages`);

      this.assertPageContract(pages);

      const warnings: PreprocessWarning[] = [];
      const spans: TextSpan[] = pages.flatMap((page) => page.spans);

      if (pages.length === 0 || spans.length === 0) {
        this.logger.warn('No text spans found for segmentation');
        return { sections: [], headings: [], warnings };
      }

      const firstPage = pages[0].pageNumber;
      const lastPage = pages[pages.length - 1].pageNumber;

      const detection = this.headingDetector.detect(spans, options);

      if (detection.fontSizeHeadings > 0) {
        warnings.push({
          stage: 'segmentation',
          code: 'FONT_SIZE_HEADING',
          message:
            `${detection.fontSizeHeadings} headings matched no numbering pattern ` +
            `and were inferred from font size (average ${detection.averageFontSize.toFixed(2)})`,
        });
      }

      if (detection.headings.length === 0) {
        this.logger.warn('No headings detected. Using single-section fallback.');
        const sections = this.treeConstructor.buildFallback(
          spans,
          firstPage,
          lastPage,
        );
        if (sections.length > 0) {
          warnings.push({
            stage: 'segmentation',
            code: 'NO_HEADINGS',
            message: 'No headings detected; whole document placed in one section',
          });
        }
        return { sections, headings: [], warnings };
      }

      const sections = this.treeConstructor.buildTree(
        detection.headings,
        spans,
        lastPage,
      );

      const violations = this.hierarchyValidator.validate(sections, pages.length);
      for (const violation of violations) {
        warnings.push({
          stage: 'segmentation',
          code: 'HIERARCHY_VIOLATION',
          message: violation,
        });
      }

      this.logger.log(`Built ${sections.length} top-level sections`);

      return { sections, headings: detection.headings, warnings };
    } catch (error) {
      if (error instanceof PreprocessError) {
        throw error;
      }
      const err = toError(error);
      this.logger.error(`Section segmentation failed: ${err.message}`);
      throw new SegmentationError(err.message, err);
    }
  }

  /**
   * Pages must be numbered 1..N in order and hold only their own spans
   */
  private assertPageContract(pages: Page[]): void {
    pages.forEach((page, index) => {
      if (page.pageNumber !== index + 1) {
        throw new SegmentationError(
          `page at position ${index + 1} has number ${page.pageNumber}; pages must be contiguous from 1`,
        );
      }

      for (const span of page.spans) {
        if (span.page !== page.pageNumber) {
          throw new SegmentationError(
            `span on page ${page.pageNumber} claims page ${span.page}`,
          );
        }
        if (typeof span.text !== 'string') {
          throw new SegmentationError(
            `span on page ${page.pageNumber} has no text`,
          );
        }
      }
    });
  }
}
