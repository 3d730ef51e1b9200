/**
 * Preprocess Config Service
 *
 * Service-wide default engine options, read from the environment.
 * Per-call options override these.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_NORMALIZER_OPTIONS,
  DEFAULT_PREPROCESS_OPTIONS,
} from '../preprocessing/constants/preprocess-defaults';
import type { PreprocessOptions } from '../preprocessing/types';

const toNumber = (value: unknown, defaultValue: number): number => {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : defaultValue;
};

const toBoolean = (value: unknown, defaultValue: boolean): boolean => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string') {
    return defaultValue;
  }
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return defaultValue;
  }
};

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

@Injectable()
export class PreprocessConfigService {
  private readonly logger = new Logger(PreprocessConfigService.name);
  private readonly defaults: PreprocessOptions;

  constructor(private readonly configService: ConfigService) {
    const d = DEFAULT_PREPROCESS_OPTIONS;
    const get = (key: string): unknown => this.configService.get<unknown>(key);

    this.defaults = {
      // at least 1 page
      minRepetition: Math.max(
        1,
        Math.floor(toNumber(get('PREPROCESS_MIN_REPETITION'), d.minRepetition)),
      ),
      positionThreshold: Math.max(
        0,
        toNumber(get('PREPROCESS_POSITION_THRESHOLD'), d.positionThreshold),
      ),
      similarityThreshold: clamp(
        toNumber(get('PREPROCESS_SIMILARITY_THRESHOLD'), d.similarityThreshold),
        0,
        1,
      ),
      minHeadingFontSize: Math.max(
        0,
        toNumber(get('PREPROCESS_MIN_HEADING_FONT_SIZE'), d.minHeadingFontSize),
      ),
      fontSizeRatioThreshold: Math.max(
        0,
        toNumber(
          get('PREPROCESS_FONT_SIZE_RATIO_THRESHOLD'),
          d.fontSizeRatioThreshold,
        ),
      ),
      normalizeText: toBoolean(get('PREPROCESS_NORMALIZE_TEXT'), d.normalizeText),
      removeHeadersFooters: toBoolean(
        get('PREPROCESS_REMOVE_HEADERS_FOOTERS'),
        d.removeHeadersFooters,
      ),
      groupByFunction: toBoolean(
        get('PREPROCESS_GROUP_BY_FUNCTION'),
        d.groupByFunction,
      ),
      normalizer: { ...DEFAULT_NORMALIZER_OPTIONS },
    };

    this.logger.log(
      `Preprocess defaults - minRepetition: ${this.defaults.minRepetition}, ` +
        `positionThreshold: ${this.defaults.positionThreshold}, ` +
        `similarityThreshold: ${this.defaults.similarityThreshold}, ` +
        `minHeadingFontSize: ${this.defaults.minHeadingFontSize}, ` +
        `fontSizeRatioThreshold: ${this.defaults.fontSizeRatioThreshold}`,
    );
  }

  getDefaults(): PreprocessOptions {
    return { ...this.defaults, normalizer: { ...this.defaults.normalizer } };
  }
}
