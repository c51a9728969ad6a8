/**
 * Constant resolution module exports
 */

export { ConstantResolver } from './ConstantResolver.js';
export type { MetricConstantEntry, ResolvedMetricConstant } from './types.js';
