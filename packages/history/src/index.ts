export * from './types';
export * from './paths';
export * from './events';
export * from './git';
export * from './scanner';
export * from './cache/types';
export * from './cache/location';
export * from './cache/lock';
export * from './cache/freshness';
export * from './cache/store';
export * from './cache/catalog';
export * from './aggregator';
export * from './pipeline/queue';
export * from './pipeline/runner';
export * from './pipeline/open';
export * from './pipeline/session';
export * from './lazy';
export * from './view/navigation';
