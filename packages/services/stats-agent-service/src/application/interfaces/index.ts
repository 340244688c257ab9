export type { IClusterStatsFetcher } from './IClusterStatsFetcher';
export type { IMetricEmitter } from './IMetricEmitter';
