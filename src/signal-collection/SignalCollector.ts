/**
 * SignalCollector - logs and metrics a set of changed Ruby files emit
 *
 * For every changed file: its own signals (depth 0), then the signals of its
 * superclasses and included/prepended modules, each tagged with its distance
 * from the changed file. Metric names registered through constants are
 * resolved against the repository's metric definition files.
 *
 * Each `collect` call starts from empty caches.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AncestorResolver } from '../ancestor-resolution/AncestorResolver.js';
import { ConstantResolver } from '../constant-resolution/ConstantResolver.js';
import { RubySourceParser } from '../ruby/RubySourceParser.js';
import { resolveDetectionRules } from '../signal-detection/constants.js';
import type { DetectionRules, DynamicMetricCall, VisitResult } from '../signal-detection/types.js';
import { deduplicateSignals } from '../validation/deduplicate.js';
import { FileAnalyzer } from './FileAnalyzer.js';
import { buildSignals } from './SignalFactory.js';
import type { Signal, SignalCollectionResult, SignalCollectorOptions } from './types.js';

/**
 * Conventional locations of metric registrations, relative to the repository root
 */
export const DEFAULT_METRIC_DEFINITION_PATHS = [
  'app/services/metrics.rb',
  'app/lib/metrics.rb',
  'lib/metrics.rb',
  'config/initializers/metrics.rb',
  'config/initializers/prometheus.rb',
  'config/initializers/statsd.rb',
  'app/models/metrics.rb',
];

const DEFAULT_OPTIONS: Omit<Required<SignalCollectorOptions>, 'repoRoot'> = {
  metricDefinitionPaths: DEFAULT_METRIC_DEFINITION_PATHS,
  detection: {},
  debug: false,
};

export class SignalCollector {
  private readonly options: Required<SignalCollectorOptions>;
  private readonly rules: DetectionRules;
  private readonly parser: RubySourceParser;

  constructor(options: SignalCollectorOptions, parser: RubySourceParser = new RubySourceParser()) {
    this.options = {
      ...DEFAULT_OPTIONS,
      ...options,
      repoRoot: path.resolve(options.repoRoot),
    };
    this.rules = resolveDetectionRules(this.options.detection);
    this.parser = parser;
  }

  /**
   * Collect signals for the given files, in order
   */
  async collect(filePaths: string[]): Promise<SignalCollectionResult> {
    const startTime = Date.now();

    const analyzer = new FileAnalyzer(this.parser, this.rules);
    const ancestors = AncestorResolver.forRepository(this.options.repoRoot, analyzer, {
      debug: this.options.debug,
    });
    const constants = await this.buildConstantResolver(filePaths);

    const signals: Signal[] = [];
    const dynamicMetricCalls: DynamicMetricCall[] = [];
    // FileAnalyzer hands back the same VisitResult for a path, so a file
    // reached several times contributes its dynamic calls once
    const foldedVisits = new Set<VisitResult>();
    let ancestorsVisited = 0;

    const fold = (visit: VisitResult, depth: number): void => {
      signals.push(...buildSignals(visit, depth, constants));

      if (!foldedVisits.has(visit)) {
        foldedVisits.add(visit);
        dynamicMetricCalls.push(...visit.dynamicMetricCalls);
      }
    };

    for (const filePath of filePaths) {
      const visit = await analyzer.analyze(filePath);
      if (!visit) {
        this.log(`Skipped ${filePath}`);
        continue;
      }

      fold(visit, 0);

      const fileAncestors = await ancestors.collectAncestors(visit.structure, filePath);
      ancestorsVisited += fileAncestors.length;

      for (const ancestor of fileAncestors) {
        const ancestorVisit = await analyzer.analyze(ancestor.file);
        if (ancestorVisit) {
          fold(ancestorVisit, ancestor.depth);
        }
      }

      this.log(`${filePath}: ${fileAncestors.length} ancestors`);
    }

    const parseFailures = [...analyzer.parseFailures];
    for (const failure of parseFailures) {
      this.log(`Parse failure in ${failure.filePath}: ${failure.message}`);
    }

    const unique = deduplicateSignals(signals);
    const collectionTimeMs = Date.now() - startTime;
    this.log(`Collected ${unique.length} signals from ${analyzer.analyzedCount} files in ${collectionTimeMs}ms`);

    return {
      signals: unique,
      dynamicMetricCalls,
      parseFailures,
      stats: {
        filesAnalyzed: analyzer.analyzedCount,
        ancestorsVisited,
        parseFailures: parseFailures.length,
        collectionTimeMs,
      },
    };
  }

  private async buildConstantResolver(filePaths: string[]): Promise<ConstantResolver> {
    const resolver = new ConstantResolver(this.parser, this.rules);
    const definitionFiles = this.options.metricDefinitionPaths.map(p => path.join(this.options.repoRoot, p));
    const sources = [...new Set([...definitionFiles, ...filePaths])];

    for (const filePath of sources) {
      let source: string;
      try {
        source = await fs.readFile(filePath, 'utf8');
      } catch {
        continue;
      }

      const failure = await resolver.scan(source, filePath);
      if (failure) {
        this.log(`Constant scan skipped ${filePath}: ${failure.message}`);
      }
    }

    this.log(`Registered ${resolver.constantMap.size} metric constants`);
    return resolver;
  }

  private log(message: string): void {
    if (this.options.debug) {
      console.log(`[SignalCollector] ${message}`);
    }
  }
}
