export * from './tree-constructor';
export * from './hierarchy-validator';
