export * from './loader';
export * from './ledger/attempt';
export * from './validator';
export * from './runs';
export * from './run-task';
export * from './suite-runner';
export * from './summary';
export * from './agent-runner';
export * from './renderer';
