/**
 * Signal Collection Types
 *
 * Output of a collection run over a set of changed Ruby files.
 */

import type { ParseFailure } from '../ruby/types.js';
import type { DetectionRules, DynamicMetricCall, LogLevel, MetricType } from '../signal-detection/types.js';

export type SignalType = 'log' | MetricType;

interface SignalBase {
  /** Event name (logs) or metric name */
  name: string;
  /** File where the call appears */
  sourceFile: string;
  /** Qualified class/module containing the call, `(top-level)` outside one */
  definingClass: string;
  /** 0 for a changed file, n for its n-th generation ancestor */
  inheritanceDepth: number;
}

export interface LogSignal extends SignalBase {
  type: 'log';
  metadata: {
    level: LogLevel;
    interpolated: boolean;
    line: number;
  };
}

export interface MetricSignal extends SignalBase {
  type: MetricType;
  metadata: {
    metricType: MetricType;
    line: number;
    /** Constant the name was resolved from, e.g. `Metrics::RequestTotal` */
    resolvedFrom?: string;
  };
}

export type Signal = LogSignal | MetricSignal;

export interface SignalCollectorOptions {
  /** Repository root; ancestor lookups and metric definitions are relative to it */
  repoRoot: string;

  /**
   * Files scanned for metric constant registrations, relative to repoRoot.
   * Changed files are always scanned too.
   */
  metricDefinitionPaths?: string[];

  /** Allow-list overrides merged over the defaults */
  detection?: Partial<DetectionRules>;

  /**
   * Debug mode
   * @default false
   */
  debug?: boolean;
}

export interface CollectionStats {
  filesAnalyzed: number;
  ancestorsVisited: number;
  parseFailures: number;
  collectionTimeMs: number;
}

export interface SignalCollectionResult {
  signals: Signal[];
  dynamicMetricCalls: DynamicMetricCall[];
  parseFailures: ParseFailure[];
  stats: CollectionStats;
}
