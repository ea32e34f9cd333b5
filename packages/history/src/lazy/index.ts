export * from './controller';
export * from './loader';
export * from './threshold';
