export * from './errors';
export * from './logger';
export * from './fs/path';
export * from './fs/io';
export * from './fs/jsonl';
export * from './string-utils';
export * from './config/schema';
export * from './types/failure';
export * from './types/patch';
export * from './types/tools';
export * from './types/events';
export * from './eval';
export * from './tools/result';
