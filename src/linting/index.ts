/**
 * Log-quality lint rules
 */

export { InterpolatedLogsRule } from './InterpolatedLogsRule.js';
export { LintRunner } from './LintRunner.js';
export type { LintRunnerOptions } from './LintRunner.js';
export type { LintIssue, LintRule } from './types.js';
