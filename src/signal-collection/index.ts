/**
 * Signal collection over changed files and their ancestors
 */

export { SignalCollector, DEFAULT_METRIC_DEFINITION_PATHS } from './SignalCollector.js';
export { FileAnalyzer } from './FileAnalyzer.js';
export { buildSignals, fallbackLogName } from './SignalFactory.js';
export type {
  Signal,
  SignalType,
  LogSignal,
  MetricSignal,
  SignalCollectorOptions,
  SignalCollectionResult,
  CollectionStats,
} from './types.js';
