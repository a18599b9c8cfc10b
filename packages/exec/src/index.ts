export * from './runner/spawn';
export * from './runner/process';
export * from './runner/deadline';
export * from './sandbox';
export * from './classify/taxonomy';
