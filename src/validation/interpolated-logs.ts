import type { Signal } from '../signal-collection/types.js';
import type { InterpolatedLogsFilterResult } from './types.js';

/**
 * Drop logs whose message was an interpolated string.
 * Their event names only approximate what is actually logged.
 */
export function filterInterpolatedLogs(signals: readonly Signal[]): InterpolatedLogsFilterResult {
  const kept = signals.filter(signal => signal.type !== 'log' || !signal.metadata.interpolated);

  return {
    signals: kept,
    excludedCount: signals.length - kept.length,
  };
}
