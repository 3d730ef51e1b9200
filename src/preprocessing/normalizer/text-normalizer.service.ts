/**
 * Text Normalizer Service
 *
 * Cleans extracted span text: Unicode form, control characters, whitespace,
 * and optionally quote and full-width digit variants.
 * normalize(normalize(s)) === normalize(s) for every combination of steps.
 */

import { Injectable, Logger } from '@nestjs/common';
import { DEFAULT_NORMALIZER_OPTIONS } from '../constants/preprocess-defaults';
import { NormalizationError, PreprocessError, toError } from '../errors';
import type { NormalizerOptions, Page } from '../types';

// Unicode category C except tab, newline, carriage return
const CONTROL_CHARS = /[^\P{C}\t\n\r]/gu;
const SINGLE_QUOTES = /[‘’‚‛`]/g;
const DOUBLE_QUOTES = /[“”„‟「」『』]/g;
const FULL_WIDTH_DIGITS = /[０-９]/g;
const URLS = /https?:\/\/\S+|www\.\S+/g;
const EXCESSIVE_PUNCTUATION = /([.,!?;:]){3,}/g;
const DEFAULT_KEEP_CHARS = '.,!?;:()[]{}\'"-\n\t ';

@Injectable()
export class TextNormalizerService {
  private readonly logger = new Logger(TextNormalizerService.name);

  /**
   * Normalize text with all enabled steps
   *
   * @throws NormalizationError if the input cannot be normalized
   */
  normalize(
    text: string,
    options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS,
  ): string {
    try {
      if (text.length === 0) {
        return '';
      }

      let result = text;

      if (options.normalizeUnicode) {
        result = result.normalize('NFC');
      }

      if (options.removeControlChars) {
        const stripped = this.removeControlCharacters(result);
        // A removed format character may have separated a base from its combining mark
        result =
          options.normalizeUnicode && stripped !== result
            ? stripped.normalize('NFC')
            : stripped;
      }

      if (options.normalizeQuotes) {
        result = this.normalizeQuotes(result);
      }

      if (options.normalizeWidth) {
        result = this.normalizeFullWidthDigits(result);
      }

      if (options.normalizeWhitespace) {
        result = this.normalizeWhitespace(result);
      }

      return result;
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Text normalization failed: ${err.message}`);
      throw new NormalizationError(err.message, err);
    }
  }

  normalizeBatch(
    texts: string[],
    options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS,
  ): string[] {
    return texts.map((text) => this.normalize(text, options));
  }

  /**
   * Normalize every span of every page
   *
   * @returns New pages; font size and position are carried over
   */
  normalizePages(
    pages: Page[],
    options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS,
  ): Page[] {
    try {
      return pages.map((page) => ({
        pageNumber: page.pageNumber,
        spans: page.spans.map((span) => ({
          ...span,
          text: this.normalize(span.text, options),
        })),
      }));
    } catch (error) {
      if (error instanceof PreprocessError) {
        throw error;
      }
      const err = toError(error);
      throw new NormalizationError(err.message, err);
    }
  }

  /**
   * Remove control characters except tab, newline and carriage return
   */
  removeControlCharacters(text: string): string {
    return text.replace(CONTROL_CHARS, '');
  }

  /**
   * Normalize whitespace, preserving line structure
   *
   * Steps:
   * 1. Runs of spaces/tabs → single space
   * 2. Trim every line
   * 3. 3+ consecutive newlines → 2 (paragraph break)
   * 4. Trim overall text
   */
  normalizeWhitespace(text: string): string {
    return text
      .split('\n')
      .map((line) => line.replace(/[ \t]+/g, ' ').trim())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  /**
   * Curly quotes, backticks and CJK corner brackets → ASCII quotes
   */
  normalizeQuotes(text: string): string {
    return text.replace(SINGLE_QUOTES, "'").replace(DOUBLE_QUOTES, '"');
  }

  /**
   * Full-width digits (０-９) → ASCII digits
   */
  normalizeFullWidthDigits(text: string): string {
    return text.replace(FULL_WIDTH_DIGITS, (digit) =>
      String.fromCharCode(digit.charCodeAt(0) - 0xfee0),
    );
  }

  removeUrls(text: string): string {
    return text.replace(URLS, '');
  }

  /**
   * Three or more consecutive punctuation marks → the last mark twice
   */
  removeExcessivePunctuation(text: string): string {
    return text.replace(EXCESSIVE_PUNCTUATION, '$1$1');
  }

  /**
   * Keep letters, digits, underscore, whitespace and the given characters
   *
   * @param keepChars - Extra characters to keep (defaults to common punctuation)
   */
  cleanSpecialCharacters(
    text: string,
    keepChars: string = DEFAULT_KEEP_CHARS,
  ): string {
    const escaped = keepChars.replace(/[\\\]^[-]/g, '\\$&');
    const pattern = new RegExp(`[^\\p{L}\\p{N}_\\s${escaped}]`, 'gu');
    return text.replace(pattern, '');
  }
}
