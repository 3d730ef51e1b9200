export * from './preprocess.types';
