export * from './value-objects';
export * from './services';
export * from './catalog';
