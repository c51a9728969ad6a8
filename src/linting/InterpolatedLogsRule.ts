/**
 * InterpolatedLogsRule
 *
 * `logger.info("User #{id} logged in")` can only be matched on its literal
 * fragments. Suggests the structured form:
 * `logger.info("user_logged_in", id: id)`.
 */

import { isLogLevel } from '../signal-detection/constants.js';
import type { LogCall } from '../signal-detection/types.js';
import type { LintIssue, LintRule } from './types.js';

const FALLBACK_EVENT_NAME = 'log_event';

export class InterpolatedLogsRule implements LintRule {
  readonly name = 'interpolated-logs';
  readonly description = 'Logs with string interpolation are harder to query in observability tools';

  check(logCall: LogCall, file: string): LintIssue | null {
    const { message } = logCall;
    if (message.kind !== 'interpolated') return null;

    return {
      rule: this.name,
      file,
      line: logCall.line,
      message: 'Log uses string interpolation',
      suggestion: this.buildSuggestion(logCall),
      context: {
        original: message.source,
        staticMatch: message.staticParts.join(''),
        interpolationCount: message.interpolationNames.length,
      },
    };
  }

  private buildSuggestion(logCall: LogCall): string {
    const eventName =
      logCall.message.staticParts
        .join(' ')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '_')
        .replace(/^_+|_+$/g, '') || FALLBACK_EVENT_NAME;

    // `logger.add(:warn, ...)` becomes `logger.warn(...)`
    const method = isLogLevel(logCall.method) ? logCall.method : logCall.level;
    const kwargs = logCall.message.interpolationNames.map(name => `${name}: ${name}`);

    return kwargs.length === 0
      ? `logger.${method}("${eventName}")`
      : `logger.${method}("${eventName}", ${kwargs.join(', ')})`;
  }
}
