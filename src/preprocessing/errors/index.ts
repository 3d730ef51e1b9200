export * from './preprocess-errors';
