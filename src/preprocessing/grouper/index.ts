export * from './functional-grouper.service';
export * from './keyword-taxonomy';
