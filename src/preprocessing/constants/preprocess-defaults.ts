import type {
  NormalizerOptions,
  PreprocessOptions,
} from '../types/preprocess.types';

export const DEFAULT_NORMALIZER_OPTIONS: Readonly<NormalizerOptions> =
  Object.freeze({
    normalizeUnicode: true,
    removeControlChars: true,
    normalizeWhitespace: true,
    normalizeQuotes: false,
    normalizeWidth: false,
  });

export const DEFAULT_PREPROCESS_OPTIONS: Readonly<PreprocessOptions> =
  Object.freeze({
    minRepetition: 3,
    positionThreshold: 50.0,
    similarityThreshold: 0.9,
    minHeadingFontSize: 12.0,
    fontSizeRatioThreshold: 1.2,
    normalizeText: true,
    removeHeadersFooters: true,
    groupByFunction: true,
    normalizer: DEFAULT_NORMALIZER_OPTIONS,
  });

// Used when no span carries a font size
export const DEFAULT_FONT_SIZE = 12.0;

export const FALLBACK_SECTION_TITLE = 'Document Content';
export const UNCLASSIFIED_GROUP_NAME = 'unclassified';
export const ALL_SECTIONS_GROUP_NAME = 'all';

// Result validation bounds (characters)
export const MIN_SECTION_CONTENT_LENGTH = 10;
export const MAX_SECTION_CONTENT_LENGTH = 100_000;
