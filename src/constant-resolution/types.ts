/**
 * Constant Resolution Types
 */

import type { MetricType } from '../signal-detection/types.js';

/**
 * Metric registered under a constant
 */
export interface MetricConstantEntry {
  /** Registered metric name */
  name: string;
  type: MetricType;
}

export interface ResolvedMetricConstant extends MetricConstantEntry {
  /** Fully qualified constant that matched */
  constantName: string;
}
