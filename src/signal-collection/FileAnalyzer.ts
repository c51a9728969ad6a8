/**
 * FileAnalyzer - parse + visit with a per-path cache
 *
 * Used both for changed files and for ancestor files met during ancestor
 * walks, so each file is read and parsed at most once per collection run.
 */

import * as fs from 'fs/promises';
import type { RubySourceParser } from '../ruby/RubySourceParser.js';
import type { ParseFailure } from '../ruby/types.js';
import { SignalVisitor } from '../signal-detection/SignalVisitor.js';
import type { DetectionRules, FileStructure, VisitResult } from '../signal-detection/types.js';
import type { StructureProvider } from '../ancestor-resolution/types.js';

export class FileAnalyzer implements StructureProvider {
  private readonly cache = new Map<string, VisitResult | null>();
  private readonly failures: ParseFailure[] = [];
  private readonly parser: RubySourceParser;
  private readonly rules: DetectionRules;

  constructor(parser: RubySourceParser, rules: DetectionRules) {
    this.parser = parser;
    this.rules = rules;
  }

  /**
   * Syntax errors met so far, one per file
   */
  get parseFailures(): readonly ParseFailure[] {
    return this.failures;
  }

  /**
   * Number of distinct files parsed successfully
   */
  get analyzedCount(): number {
    let count = 0;
    for (const result of this.cache.values()) {
      if (result) count++;
    }
    return count;
  }

  /**
   * Visit result for a file, or null when it is missing, unreadable or
   * not valid Ruby
   */
  async analyze(filePath: string): Promise<VisitResult | null> {
    const cached = this.cache.get(filePath);
    if (cached !== undefined) {
      return cached;
    }

    const result = await this.analyzeUncached(filePath);
    this.cache.set(filePath, result);
    return result;
  }

  async getStructure(filePath: string): Promise<FileStructure | null> {
    const result = await this.analyze(filePath);
    return result ? result.structure : null;
  }

  private async analyzeUncached(filePath: string): Promise<VisitResult | null> {
    let source: string;
    try {
      source = await fs.readFile(filePath, 'utf8');
    } catch {
      return null;
    }

    const visitor = new SignalVisitor(filePath, this.rules);
    const outcome = await this.parser.visit(source, filePath, root => visitor.visit(root));

    if (!outcome.success) {
      this.failures.push(outcome.failure);
      return null;
    }
    return outcome.value;
  }
}
