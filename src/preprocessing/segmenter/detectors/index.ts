/**
 * Detectors Barrel Export
 */

export * from './pattern-heading.detector';
export * from './font-size-heading.detector';
export * from './composite-heading.detector';
