export * from './section-segmenter.service';
export * from './builders';
export * from './detectors';
export * from './flatteners/section-flattener';
