/**
 * Signal detection module exports
 */

export { SignalVisitor } from './SignalVisitor.js';
export { deriveEventName, severityOf, describeMessage } from './log-messages.js';
export {
  TOP_LEVEL,
  LOG_LEVELS,
  METRIC_ACTION_METHODS,
  METRIC_FACTORY_METHODS,
  DEFAULT_DETECTION_RULES,
  inferMetricType,
  isLogLevel,
  isMetricFactory,
  resolveDetectionRules,
} from './constants.js';
export type {
  LogLevel,
  MetricType,
  ModuleRelationKind,
  ClassStructure,
  ModuleRelation,
  FileStructure,
  LogMessage,
  LogCall,
  MetricCall,
  DynamicMetricCall,
  ConstantMetricReference,
  VisitResult,
  DetectionRules,
} from './types.js';
