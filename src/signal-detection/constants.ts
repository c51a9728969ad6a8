import type { DetectionRules, LogLevel, MetricType, ModuleRelationKind } from './types.js';

/**
 * Defining class recorded for code outside any class or module
 */
export const TOP_LEVEL = '(top-level)';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal', 'unknown'];

/** `Logger#add` / `Logger#log` take their severity first */
export const GENERIC_LOG_METHODS = new Set(['add', 'log']);

export const INCLUSION_METHODS: readonly ModuleRelationKind[] = ['include', 'prepend', 'extend'];

export const METRIC_FACTORY_METHODS = new Set(['counter', 'gauge', 'histogram', 'summary']);

export const METRIC_ACTION_METHODS = new Set([
  'increment', 'incr', 'decrement', 'decr', 'set', 'observe', 'time', 'timing', 'emit',
]);

const METRIC_TYPE_BY_METHOD = new Map<string, MetricType>([
  ['counter', 'counter'],
  ['increment', 'counter'],
  ['incr', 'counter'],
  ['register_counter', 'counter'],
  ['gauge', 'gauge'],
  ['set', 'gauge'],
  ['register_gauge', 'gauge'],
  ['histogram', 'histogram'],
  ['observe', 'histogram'],
  ['timing', 'histogram'],
  ['time', 'histogram'],
  ['register_histogram', 'histogram'],
  ['summary', 'summary'],
  ['register_summary', 'summary'],
]);

export const DEFAULT_DETECTION_RULES: DetectionRules = {
  logNamespaces: ['Rails', 'Sidekiq', 'Hanami'],
  constantLoggers: ['LOG', 'LOGGER'],
  loggingTraits: ['Loggy::ClassLogger', 'Loggy::InstanceLogger'],
  metricReceivers: ['Prometheus', 'StatsD', 'Statsd', 'Hesiod', 'Datadog', 'DogStatsD'],
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function isInclusionMethod(method: string): method is ModuleRelationKind {
  return INCLUSION_METHODS.some(kind => kind === method);
}

export function isMetricFactory(method: string): boolean {
  return METRIC_FACTORY_METHODS.has(method) || method.startsWith('register_');
}

/**
 * Metric type implied by a factory or action method; counter when unknown
 */
export function inferMetricType(method: string): MetricType {
  return METRIC_TYPE_BY_METHOD.get(method) ?? 'counter';
}

/**
 * Merge partial allow-list overrides over the defaults
 */
export function resolveDetectionRules(overrides: Partial<DetectionRules> = {}): DetectionRules {
  return { ...DEFAULT_DETECTION_RULES, ...overrides };
}
