export * from './config/loader';
export * from './tools/events';
export * from './tools/builtins';
export * from './tools/dispatcher';
export * from './agents';
