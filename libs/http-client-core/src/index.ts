export type {
  HttpTransport,
  Logger,
  MetricsSink,
  QueryParamValue,
  QueryParams,
  RequestMetrics,
} from './types';
export { buildUrl, defaultTransport } from './helpers';
