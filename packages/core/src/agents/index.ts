export * from './agent';
export * from './scripted';
export * from './script';
