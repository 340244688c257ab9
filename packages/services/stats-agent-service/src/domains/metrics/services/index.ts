export { RateDerivationEngine } from './RateDerivationEngine';
export type { CounterState } from './RateDerivationEngine';
export { aggregate, distinctVersionCount, totalQueries, emptyQueryTotals } from './StatsAggregator';
export type { AggregateResult, QueryTotals } from './StatsAggregator';
export { swapUsedRatio, firstLoadAverage } from './special-values';
