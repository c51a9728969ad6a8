/**
 * Lint Types
 */

import type { LogCall } from '../signal-detection/types.js';

export interface LintIssue {
  /** Identifier of the rule that raised the issue */
  rule: string;
  file: string;
  line: number;
  message: string;
  /** Rewritten call, ready to paste */
  suggestion: string;
  context: {
    /** Message argument as written */
    original: string;
    /** Literal text a log search can match on */
    staticMatch: string;
    interpolationCount: number;
  };
}

/**
 * A rule applied to every log call found in a file
 */
export interface LintRule {
  readonly name: string;
  readonly description: string;
  check(logCall: LogCall, file: string): LintIssue | null;
}
