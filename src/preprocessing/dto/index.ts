export * from './preprocess-request.dto';
