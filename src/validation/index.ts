/**
 * Post-processing of collected signals
 */

export { deduplicateSignals } from './deduplicate.js';
export { filterInterpolatedLogs } from './interpolated-logs.js';
export { SignalLimits } from './SignalLimits.js';
export type { SignalLimitsConfig, InterpolatedLogsFilterResult } from './types.js';
