export * from './engine';
export * from './search';
