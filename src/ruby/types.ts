/**
 * Ruby parsing types
 */

import type { Tree } from 'web-tree-sitter';

/**
 * A source file the grammar could not parse cleanly.
 * The file contributes no structure and no signals.
 */
export interface ParseFailure {
  filePath: string;
  message: string;
  /** 1-based line of the first syntax error, when one was located */
  line?: number;
}

export type ParseResult =
  | { success: true; filePath: string; tree: Tree }
  | { success: false; filePath: string; failure: ParseFailure };

export type VisitOutcome<T> =
  | { success: true; value: T }
  | { success: false; failure: ParseFailure };
