/**
 * Preprocessing Type Definitions
 *
 * Pipeline: Normalize → Remove headers/footers → Segment → Group
 */

/**
 * Input from the Extractor
 */
export interface TextSpan {
  page: number; // 1-indexed
  text: string;
  fontSize?: number;
  yPosition?: number; // points from page top
}

export interface Page {
  pageNumber: number;
  spans: TextSpan[];
}

/**
 * Section tree
 */
export interface PageRange {
  start: number;
  end: number;
}

export interface Section {
  title: string;
  level: number; // >= 1
  content: string;
  pageRange: PageRange;
  subsections: Section[];
}

export interface FunctionalGroup {
  name: string;
  sections: Section[];
  keywords: string[];
}

export interface PreprocessResult {
  groups: FunctionalGroup[];
  removedHeaderPatterns: string[];
  removedFooterPatterns: string[];
}

/**
 * Ordered group name → lowercase keywords
 */
export type KeywordTaxonomy = ReadonlyMap<string, readonly string[]>;

/**
 * Options
 */
export interface NormalizerOptions {
  normalizeUnicode: boolean;
  removeControlChars: boolean;
  normalizeWhitespace: boolean;
  normalizeQuotes: boolean;
  normalizeWidth: boolean;
}

export interface NoiseRemovalOptions {
  minRepetition: number;
  positionThreshold: number;
  similarityThreshold: number;
}

export interface SegmentationOptions {
  minHeadingFontSize: number;
  fontSizeRatioThreshold: number;
}

export interface PreprocessOptions
  extends NoiseRemovalOptions,
    SegmentationOptions {
  normalizeText: boolean;
  removeHeadersFooters: boolean;
  groupByFunction: boolean;
  normalizer: NormalizerOptions;
  customKeywords?: Record<string, string[]>;
}

/**
 * Per-call overrides; nested normalizer steps may be given partially
 */
export type PreprocessOverrides = Partial<
  Omit<PreprocessOptions, 'normalizer'>
> & {
  normalizer?: Partial<NormalizerOptions>;
};

/**
 * Diagnostics
 */
export type PreprocessStageName =
  | 'input'
  | 'normalization'
  | 'noise-removal'
  | 'segmentation'
  | 'grouping'
  | 'validation';

export type PreprocessWarningCode =
  | 'EMPTY_SPANS'
  | 'FONT_SIZE_HEADING'
  | 'NO_HEADINGS'
  | 'HIERARCHY_VIOLATION'
  | 'UNCLASSIFIED_SECTION'
  | 'NO_GROUPS'
  | 'EMPTY_GROUP'
  | 'EMPTY_TITLE'
  | 'SHORT_CONTENT'
  | 'LONG_CONTENT';

export interface PreprocessWarning {
  stage: PreprocessStageName;
  code: PreprocessWarningCode;
  message: string;
}

export interface PreprocessStatistics {
  normalizationTime: number; // ms
  noiseRemovalTime: number;
  segmentationTime: number;
  groupingTime: number;
  totalTime: number;
  totalPages: number;
  inputSpans: number;
  removedSpans: number;
  totalSections: number;
  topLevelSections: number;
  maxDepth: number;
  totalGroups: number;
}

export interface PreprocessDiagnostics {
  warnings: PreprocessWarning[];
  statistics: PreprocessStatistics;
}

/**
 * Configuration actually used for a call (audit/reproducibility)
 */
export interface EffectiveConfig extends Omit<PreprocessOptions, 'customKeywords'> {
  keywordTaxonomy: Array<{ name: string; keywords: string[] }>;
}

export interface PreprocessOutput {
  result: PreprocessResult;
  diagnostics: PreprocessDiagnostics;
  config: EffectiveConfig;
}

/**
 * Stage outputs
 */
export interface NoiseRemovalResult {
  pages: Page[];
  headerPatterns: string[];
  footerPatterns: string[];
  removedSpanCount: number;
}

export type HeadingSource = 'pattern' | 'font-size';

export interface Heading {
  spanIndex: number; // index in the document-order span stream
  page: number;
  title: string;
  level: number;
  source: HeadingSource;
  fontSize?: number;
}

export interface SegmentationResult {
  sections: Section[];
  headings: Heading[];
  warnings: PreprocessWarning[];
}

export interface TreeStatistics {
  totalSections: number;
  topLevelSections: number;
  maxDepth: number;
}

export interface GroupingResult {
  groups: FunctionalGroup[];
  unclassifiedCount: number;
}
