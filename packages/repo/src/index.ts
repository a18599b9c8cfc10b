export * from './fs/guard';
export * from './patch/parser';
export * from './patch/validator';
export * from './patch/applier';
export * from './git';
export * from './search/types';
export * from './search/simple';
export * from './search/ripgrep';
