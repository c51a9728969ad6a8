/**
 * SignalLimits - cap the signals sent to a dashboard
 *
 * Logs and metrics are first truncated to their own maxima, then trimmed to
 * the panel budget: logs are dropped first (from the end), then metrics.
 * Every truncation adds a human-readable warning.
 */

import type { LogSignal, MetricSignal, Signal } from '../signal-collection/types.js';
import type { SignalLimitsConfig } from './types.js';

const DEFAULT_LIMITS: Required<SignalLimitsConfig> = {
  maxLogs: 10,
  maxMetrics: 10,
  maxPanels: 12,
};

const HISTOGRAM_PANELS = 3;

export class SignalLimits {
  private readonly limits: Required<SignalLimitsConfig>;
  private readonly collectedWarnings: string[] = [];

  constructor(config: SignalLimitsConfig = {}) {
    this.limits = { ...DEFAULT_LIMITS, ...config };
  }

  get warnings(): readonly string[] {
    return this.collectedWarnings;
  }

  /**
   * Signals that fit within the limits: logs first, then metrics
   */
  truncateAndValidate(signals: readonly Signal[]): Signal[] {
    const logs = signals.filter((signal): signal is LogSignal => signal.type === 'log');
    const metrics = signals.filter((signal): signal is MetricSignal => signal.type !== 'log');

    const cappedLogs = this.truncate('logs', logs, this.limits.maxLogs);
    const cappedMetrics = this.truncate('metrics', metrics, this.limits.maxMetrics);

    return this.truncateByPanelLimit(cappedLogs, cappedMetrics);
  }

  private truncate<T extends Signal>(label: string, signals: T[], limit: number): T[] {
    if (signals.length <= limit) return signals;

    this.collectedWarnings.push(`${signals.length - limit} ${label} not added to dashboard (limit: ${limit})`);
    return signals.slice(0, limit);
  }

  private truncateByPanelLimit(logs: LogSignal[], metrics: MetricSignal[]): Signal[] {
    const total = logs.length + metrics.reduce((sum, metric) => sum + panelCost(metric), 0);
    if (total <= this.limits.maxPanels) {
      return [...logs, ...metrics];
    }

    const keptLogs = [...logs];
    const keptMetrics = [...metrics];
    let panelsToRemove = total - this.limits.maxPanels;

    while (panelsToRemove > 0 && keptLogs.length > 0) {
      keptLogs.pop();
      panelsToRemove -= 1;
    }

    while (panelsToRemove > 0 && keptMetrics.length > 0) {
      const removed = keptMetrics.pop();
      panelsToRemove -= removed ? panelCost(removed) : 1;
    }

    const excludedLogs = logs.length - keptLogs.length;
    const excludedMetrics = metrics.length - keptMetrics.length;
    const parts: string[] = [];
    if (excludedLogs > 0) parts.push(`${excludedLogs} logs`);
    if (excludedMetrics > 0) parts.push(`${excludedMetrics} metrics`);

    if (parts.length > 0) {
      this.collectedWarnings.push(
        `${parts.join(', ')} not added to dashboard (panel limit: ${this.limits.maxPanels})`
      );
    }

    return [...keptLogs, ...keptMetrics];
  }
}

function panelCost(metric: MetricSignal): number {
  return metric.metadata.metricType === 'histogram' ? HISTOGRAM_PANELS : 1;
}
