/**
 * Turn one file's visit result into signals
 */

import { createHash } from 'crypto';
import type { ConstantResolver } from '../constant-resolution/ConstantResolver.js';
import type { LogCall, VisitResult } from '../signal-detection/types.js';
import type { LogSignal, MetricSignal, Signal } from './types.js';

/**
 * Name for a log call whose message gives no usable text:
 * `log_` + first 8 hex chars of sha256("<class>:<level>:<line>")
 */
export function fallbackLogName(call: Pick<LogCall, 'definingClass' | 'level' | 'line'>): string {
  const input = `${call.definingClass}:${call.level}:${call.line}`;
  const hash = createHash('sha256').update(input).digest('hex').substring(0, 8);
  return `log_${hash}`;
}

/**
 * Signals of a file in a fixed order: logs, literal metrics, then metrics
 * resolved through registered constants. Constant references that match no
 * registration produce nothing.
 */
export function buildSignals(visit: VisitResult, inheritanceDepth: number, constants: ConstantResolver): Signal[] {
  const sourceFile = visit.filePath;

  const logs = visit.logCalls.map((call): LogSignal => ({
    type: 'log',
    name: call.eventName ?? fallbackLogName(call),
    sourceFile,
    definingClass: call.definingClass,
    inheritanceDepth,
    metadata: { level: call.level, interpolated: call.interpolated, line: call.line },
  }));

  const metrics = visit.metricCalls.map((call): MetricSignal => ({
    type: call.metricType,
    name: call.name,
    sourceFile,
    definingClass: call.definingClass,
    inheritanceDepth,
    metadata: { metricType: call.metricType, line: call.line },
  }));

  const resolved = visit.constantReferences.flatMap((reference): MetricSignal[] => {
    const entry = constants.resolveFromScope(reference.constantName, reference.lexicalScopes);
    if (!entry) return [];

    return [{
      type: entry.type,
      name: entry.name,
      sourceFile,
      definingClass: reference.definingClass,
      inheritanceDepth,
      metadata: { metricType: entry.type, line: reference.line, resolvedFrom: entry.constantName },
    }];
  });

  return [...logs, ...metrics, ...resolved];
}
