/**
 * Preprocessing Error Definitions
 *
 * All errors are permanent: nothing is retried internally.
 */

import type { PreprocessStageName } from '../types';

/**
 * Base Preprocess Error
 */
export class PreprocessError extends Error {
  constructor(
    public readonly stage: PreprocessStageName,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'PreprocessError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid Content Error
 * Raised when there are no pages, or no spans on any page
 */
export class InvalidContentError extends PreprocessError {
  constructor(message: string) {
    super('input', message);
    this.name = 'InvalidContentError';
  }
}

export class NormalizationError extends PreprocessError {
  constructor(message: string, originalError?: Error) {
    super('normalization', `Failed to normalize text: ${message}`, originalError);
    this.name = 'NormalizationError';
  }
}

export class NoiseRemovalError extends PreprocessError {
  constructor(message: string, originalError?: Error) {
    super(
      'noise-removal',
      `Failed to remove headers/footers: ${message}`,
      originalError,
    );
    this.name = 'NoiseRemovalError';
  }
}

export class SegmentationError extends PreprocessError {
  constructor(message: string, originalError?: Error) {
    super('segmentation', `Failed to segment sections: ${message}`, originalError);
    this.name = 'SegmentationError';
  }
}

export class GroupingError extends PreprocessError {
  constructor(message: string, originalError?: Error) {
    super('grouping', `Failed to group sections: ${message}`, originalError);
    this.name = 'GroupingError';
  }
}

/**
 * Normalize an unknown thrown value
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
