/**
 * Preprocess Engine
 *
 * Orchestrates the document structuring pipeline:
 * Normalize → Remove headers/footers → Segment → Group
 *
 * Responsibilities:
 * - Validate the incoming page/span stream
 * - Run the stages in strict sequence (any stage error aborts the call)
 * - Collect per-stage statistics and non-fatal warnings
 * - Report the effective configuration used
 */

import { Injectable, Logger } from '@nestjs/common';
import { PreprocessConfigService } from '../config/preprocess-config.service';
import {
  ALL_SECTIONS_GROUP_NAME,
  MAX_SECTION_CONTENT_LENGTH,
  MIN_SECTION_CONTENT_LENGTH,
} from './constants/preprocess-defaults';
import { InvalidContentError, PreprocessError, toError } from './errors';
import {
  DEFAULT_KEYWORD_TAXONOMY,
  FunctionalGrouperService,
  mergeTaxonomy,
  toTaxonomyEntries,
} from './grouper';
import { HeaderFooterRemoverService } from './noise/header-footer-remover.service';
import { TextNormalizerService } from './normalizer/text-normalizer.service';
import {
  SectionFlattener,
  SectionSegmenterService,
  TreeConstructor,
} from './segmenter';
import type {
  EffectiveConfig,
  FunctionalGroup,
  KeywordTaxonomy,
  Page,
  PreprocessOptions,
  PreprocessOutput,
  PreprocessOverrides,
  PreprocessResult,
  PreprocessStatistics,
  PreprocessWarning,
  Section,
} from './types';

@Injectable()
export class PreprocessEngine {
  private readonly logger = new Logger(PreprocessEngine.name);

  constructor(
    private readonly configService: PreprocessConfigService,
    private readonly textNormalizer: TextNormalizerService,
    private readonly headerFooterRemover: HeaderFooterRemoverService,
    private readonly sectionSegmenter: SectionSegmenterService,
    private readonly functionalGrouper: FunctionalGrouperService,
    private readonly sectionFlattener: SectionFlattener,
    private readonly treeConstructor: TreeConstructor,
  ) {}

  /**
   * Structure a document into functional groups
   *
   * @throws InvalidContentError if there are no pages or no spans
   */
  process(pages: Page[], overrides: PreprocessOverrides = {}): PreprocessResult {
    return this.execute(pages, overrides).result;
  }

  /**
   * Run the full pipeline
   *
   * @param pages - Pages from the Extractor, numbered 1..N
   * @param overrides - Per-call options; unset fields use service defaults
   * @returns Result, diagnostics and the effective configuration
   */
  execute(pages: Page[], overrides: PreprocessOverrides = {}): PreprocessOutput {
    const startTime = Date.now();
    let currentStage = 'input';

    try {
      const warnings: PreprocessWarning[] = [];
      const inputSpans = this.validateInput(pages, warnings);

      this.logger.log(`=== Preprocessing Start === Pages: ${pages.length}`);

      const options = this.resolveOptions(overrides);
      const taxonomy = mergeTaxonomy(
        DEFAULT_KEYWORD_TAXONOMY,
        options.customKeywords,
      );

      // Step 1: Normalize text
      currentStage = 'normalization';
      let stageStart = Date.now();
      let workingPages = pages;
      if (options.normalizeText) {
        workingPages = this.textNormalizer.normalizePages(
          pages,
          options.normalizer,
        );
      }
      const normalizationTime = Date.now() - stageStart;

      // Step 2: Remove headers and footers
      currentStage = 'noise-removal';
      stageStart = Date.now();
      let headerPatterns: string[] = [];
      let footerPatterns: string[] = [];
      let removedSpans = 0;
      if (options.removeHeadersFooters) {
        const noise = this.headerFooterRemover.remove(workingPages, options);
        workingPages = noise.pages;
        headerPatterns = noise.headerPatterns;
        footerPatterns = noise.footerPatterns;
        removedSpans = noise.removedSpanCount;
      }
      const noiseRemovalTime = Date.now() - stageStart;

      // Step 3: Segment into sections
      currentStage = 'segmentation';
      stageStart = Date.now();
      const segmentation = this.sectionSegmenter.segment(workingPages, options);
      warnings.push(...segmentation.warnings);
      const sections = segmentation.sections;
      const segmentationTime = Date.now() - stageStart;

      // Step 4: Group by functional category
      currentStage = 'grouping';
      stageStart = Date.now();
      let groups: FunctionalGroup[] = [];
      if (options.groupByFunction) {
        const grouping = this.functionalGrouper.group(sections, taxonomy);
        groups = grouping.groups;
        if (grouping.unclassifiedCount > 0) {
          warnings.push({
            stage: 'grouping',
            code: 'UNCLASSIFIED_SECTION',
            message: `${grouping.unclassifiedCount} sections matched no taxonomy group`,
          });
        }
      } else if (sections.length > 0) {
        groups = [
          {
            name: ALL_SECTIONS_GROUP_NAME,
            sections: this.sectionFlattener.flatten(sections),
            keywords: [],
          },
        ];
      }
      const groupingTime = Date.now() - stageStart;

      currentStage = 'validation';
      warnings.push(...this.validateResult(groups));

      const tree = this.treeConstructor.calculateStatistics(sections);
      const statistics: PreprocessStatistics = {
        normalizationTime,
        noiseRemovalTime,
        segmentationTime,
        groupingTime,
        totalTime: Date.now() - startTime,
        totalPages: pages.length,
        inputSpans,
        removedSpans,
        totalSections: tree.totalSections,
        topLevelSections: tree.topLevelSections,
        maxDepth: tree.maxDepth,
        totalGroups: groups.length,
      };

      this.logStatistics(statistics, groups);

      return {
        result: {
          groups,
          removedHeaderPatterns: headerPatterns,
          removedFooterPatterns: footerPatterns,
        },
        diagnostics: { warnings, statistics },
        config: this.toEffectiveConfig(options, taxonomy),
      };
    } catch (error) {
      const duration = Date.now() - startTime;
      const err = toError(error);
      const stage = error instanceof PreprocessError ? error.stage : currentStage;

      this.logger.error(
        `=== Preprocessing Failed === Stage: ${stage}, Duration: ${duration}ms`,
        err.stack,
      );

      throw error;
    }
  }

  /**
   * Merge per-call overrides onto service defaults
   */
  resolveOptions(overrides: PreprocessOverrides = {}): PreprocessOptions {
    const defaults = this.configService.getDefaults();

    return {
      minRepetition: overrides.minRepetition ?? defaults.minRepetition,
      positionThreshold: overrides.positionThreshold ?? defaults.positionThreshold,
      similarityThreshold:
        overrides.similarityThreshold ?? defaults.similarityThreshold,
      minHeadingFontSize:
        overrides.minHeadingFontSize ?? defaults.minHeadingFontSize,
      fontSizeRatioThreshold:
        overrides.fontSizeRatioThreshold ?? defaults.fontSizeRatioThreshold,
      normalizeText: overrides.normalizeText ?? defaults.normalizeText,
      removeHeadersFooters:
        overrides.removeHeadersFooters ?? defaults.removeHeadersFooters,
      groupByFunction: overrides.groupByFunction ?? defaults.groupByFunction,
      normalizer: {
        normalizeUnicode:
          overrides.normalizer?.normalizeUnicode ??
          defaults.normalizer.normalizeUnicode,
        removeControlChars:
          overrides.normalizer?.removeControlChars ??
          defaults.normalizer.removeControlChars,
        normalizeWhitespace:
          overrides.normalizer?.normalizeWhitespace ??
          defaults.normalizer.normalizeWhitespace,
        normalizeQuotes:
          overrides.normalizer?.normalizeQuotes ??
          defaults.normalizer.normalizeQuotes,
        normalizeWidth:
          overrides.normalizer?.normalizeWidth ??
          defaults.normalizer.normalizeWidth,
      },
      customKeywords: overrides.customKeywords ?? defaults.customKeywords,
    };
  }

  /**
   * @returns Number of input spans
   * @throws InvalidContentError if there are no pages or no spans, or a page
   * breaks the page/span shape
   */
  private validateInput(pages: Page[], warnings: PreprocessWarning[]): number {
    if (!Array.isArray(pages)) {
      throw new InvalidContentError('Pages must be an array');
    }
    if (pages.length === 0) {
      throw new InvalidContentError('Document has no pages');
    }

    pages.forEach((page, index) => {
      if (typeof page !== 'object' || page === null || !Array.isArray(page.spans)) {
        throw new InvalidContentError(
          `Page at position ${index + 1} has no spans array`,
        );
      }
      const badSpan = page.spans.findIndex(
        (span) => typeof span !== 'object' || span === null,
      );
      if (badSpan !== -1) {
        throw new InvalidContentError(
          `Span ${badSpan + 1} on page at position ${index + 1} is not an object`,
        );
      }
    });

    const spanCount = pages.reduce((sum, page) => sum + page.spans.length, 0);
    if (spanCount === 0) {
      throw new InvalidContentError('Document has no text spans on any page');
    }

    const hasText = pages.some((page) =>
      page.spans.some(
        (span) => typeof span.text === 'string' && span.text.trim().length > 0,
      ),
    );
    if (!hasText) {
      this.logger.warn('Document has spans but no text content');
      warnings.push({
        stage: 'input',
        code: 'EMPTY_SPANS',
        message: `All ${spanCount} spans are empty`,
      });
    }

    return spanCount;
  }

  /**
   * Non-fatal checks on the final groups
   */
  private validateResult(groups: FunctionalGroup[]): PreprocessWarning[] {
    const warnings: PreprocessWarning[] = [];

    if (groups.length === 0) {
      this.logger.warn('No functional groups created');
      warnings.push({
        stage: 'validation',
        code: 'NO_GROUPS',
        message: 'No functional groups created',
      });
      return warnings;
    }

    const checked = new Set<Section>();

    for (const group of groups) {
      if (group.sections.length === 0) {
        warnings.push({
          stage: 'validation',
          code: 'EMPTY_GROUP',
          message: `Functional group '${group.name}' has no sections`,
        });
      }

      for (const section of group.sections) {
        if (checked.has(section)) {
          continue;
        }
        checked.add(section);

        if (section.title.trim().length === 0) {
          warnings.push({
            stage: 'validation',
            code: 'EMPTY_TITLE',
            message: `Section in group '${group.name}' has empty title`,
          });
        }

        if (section.content.length > MAX_SECTION_CONTENT_LENGTH) {
          warnings.push({
            stage: 'validation',
            code: 'LONG_CONTENT',
            message: `Section '${section.title}' has very long content (${section.content.length} chars)`,
          });
        } else if (section.content.length < MIN_SECTION_CONTENT_LENGTH) {
          warnings.push({
            stage: 'validation',
            code: 'SHORT_CONTENT',
            message: `Section '${section.title}' has very short content (${section.content.length} chars)`,
          });
        }
      }
    }

    return warnings;
  }

  private toEffectiveConfig(
    options: PreprocessOptions,
    taxonomy: KeywordTaxonomy,
  ): EffectiveConfig {
    return {
      minRepetition: options.minRepetition,
      positionThreshold: options.positionThreshold,
      similarityThreshold: options.similarityThreshold,
      minHeadingFontSize: options.minHeadingFontSize,
      fontSizeRatioThreshold: options.fontSizeRatioThreshold,
      normalizeText: options.normalizeText,
      removeHeadersFooters: options.removeHeadersFooters,
      groupByFunction: options.groupByFunction,
      normalizer: { ...options.normalizer },
      keywordTaxonomy: toTaxonomyEntries(taxonomy),
    };
  }

  private logStatistics(
    statistics: PreprocessStatistics,
    groups: FunctionalGroup[],
  ): void {
    this.logger.log(
      `=== Preprocessing Complete === Duration: ${statistics.totalTime}ms ` +
        `(normalize: ${statistics.normalizationTime}ms, ` +
        `headers/footers: ${statistics.noiseRemovalTime}ms, ` +
        `segment: ${statistics.segmentationTime}ms, ` +
        `group: ${statistics.groupingTime}ms), ` +
        `Sections: ${statistics.totalSections}, Groups: ${statistics.totalGroups}, ` +
        `Removed spans: ${statistics.removedSpans}`,
    );

    for (const group of groups) {
      this.logger.debug(`  - ${group.name}: ${group.sections.length} sections`);
    }
  }
}
