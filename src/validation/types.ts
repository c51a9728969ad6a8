/**
 * Validation Types
 */

import type { Signal } from '../signal-collection/types.js';

export interface SignalLimitsConfig {
  /** @default 10 */
  maxLogs?: number;
  /** @default 10 */
  maxMetrics?: number;
  /** Panel budget; a histogram takes 3 panels (p50, p95, p99), anything else 1 */
  maxPanels?: number;
}

export interface InterpolatedLogsFilterResult {
  signals: Signal[];
  excludedCount: number;
}
