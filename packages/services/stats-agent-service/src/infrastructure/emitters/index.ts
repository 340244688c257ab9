export { PrometheusMetricEmitter } from './PrometheusMetricEmitter';
export { LoggingMetricEmitter } from './LoggingMetricEmitter';
