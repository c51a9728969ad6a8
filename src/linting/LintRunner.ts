/**
 * LintRunner - apply lint rules to the log calls of a set of files
 *
 * Files that are missing or fail to parse are skipped.
 */

import * as fs from 'fs/promises';
import { RubySourceParser } from '../ruby/RubySourceParser.js';
import { resolveDetectionRules } from '../signal-detection/constants.js';
import { SignalVisitor } from '../signal-detection/SignalVisitor.js';
import type { DetectionRules } from '../signal-detection/types.js';
import { InterpolatedLogsRule } from './InterpolatedLogsRule.js';
import type { LintIssue, LintRule } from './types.js';

export interface LintRunnerOptions {
  rules?: LintRule[];
  /** Allow-list overrides merged over the defaults */
  detection?: Partial<DetectionRules>;
  parser?: RubySourceParser;
}

export class LintRunner {
  private readonly rules: LintRule[];
  private readonly detection: DetectionRules;
  private readonly parser: RubySourceParser;
  private collected: LintIssue[] = [];

  constructor(options: LintRunnerOptions = {}) {
    this.rules = options.rules ?? [new InterpolatedLogsRule()];
    this.detection = resolveDetectionRules(options.detection);
    this.parser = options.parser ?? new RubySourceParser();
  }

  get issues(): readonly LintIssue[] {
    return this.collected;
  }

  /**
   * Lint the given files; replaces the issues of any previous run
   */
  async run(files: string[]): Promise<LintIssue[]> {
    this.collected = [];

    for (const file of files) {
      this.collected.push(...(await this.analyzeFile(file)));
    }

    return this.collected;
  }

  issuesByRule(): Map<string, LintIssue[]> {
    const grouped = new Map<string, LintIssue[]>();
    for (const issue of this.collected) {
      const existing = grouped.get(issue.rule);
      if (existing) {
        existing.push(issue);
      } else {
        grouped.set(issue.rule, [issue]);
      }
    }
    return grouped;
  }

  private async analyzeFile(file: string): Promise<LintIssue[]> {
    let source: string;
    try {
      source = await fs.readFile(file, 'utf8');
    } catch {
      return [];
    }

    const visitor = new SignalVisitor(file, this.detection);
    const outcome = await this.parser.visit(source, file, root => visitor.visit(root));
    if (!outcome.success) return [];

    const issues: LintIssue[] = [];
    for (const logCall of outcome.value.logCalls) {
      for (const rule of this.rules) {
        const issue = rule.check(logCall, file);
        if (issue) issues.push(issue);
      }
    }
    return issues;
  }
}
