/**
 * Constant Resolver
 *
 * Collects metric objects registered under constants, e.g.
 *
 *   module Metrics
 *     RequestTotal = Hesiod.register_counter("request_total")
 *   end
 *   CACHE_HIT = StatsD.counter("cache.hit")
 *
 * so that `Metrics::RequestTotal.increment` or `CACHE_HIT.increment` can be
 * reported under the registered metric name.
 */

import type { Node } from 'web-tree-sitter';
import type { RubySourceParser } from '../ruby/RubySourceParser.js';
import type { ParseFailure } from '../ruby/types.js';
import {
  constantName,
  isRootScoped,
  methodName,
  namedChildrenOf,
  positionalArguments,
  receiverOf,
  stringLiteralValue,
  symbolLiteralValue,
} from '../ruby/node-utils.js';
import { DEFAULT_DETECTION_RULES, inferMetricType, isMetricFactory } from '../signal-detection/constants.js';
import type { DetectionRules } from '../signal-detection/types.js';
import type { MetricConstantEntry, ResolvedMetricConstant } from './types.js';

/** Constants assigned inside methods are not registrations */
const SKIPPED_NODE_TYPES = new Set(['method', 'singleton_method']);

export class ConstantResolver {
  private readonly constants = new Map<string, MetricConstantEntry>();
  private readonly parser: RubySourceParser;
  private readonly rules: DetectionRules;

  constructor(parser: RubySourceParser, rules: DetectionRules = DEFAULT_DETECTION_RULES) {
    this.parser = parser;
    this.rules = rules;
  }

  /**
   * Registered constants, keyed by fully qualified name
   */
  get constantMap(): ReadonlyMap<string, MetricConstantEntry> {
    return this.constants;
  }

  /**
   * Scan one source for metric constant registrations.
   * Returns the parse failure when the source is not valid Ruby.
   */
  async scan(source: string, filePath: string): Promise<ParseFailure | null> {
    const outcome = await this.parser.visit(source, filePath, root => this.scanNode(root, []));
    return outcome.success ? null : outcome.failure;
  }

  resolve(constant: string): MetricConstantEntry | undefined {
    return this.constants.get(constant);
  }

  /**
   * Resolve a constant as Ruby would from inside the given namespaces
   * (innermost first), falling back to the top level
   */
  resolveFromScope(constant: string, lexicalScopes: readonly string[]): ResolvedMetricConstant | undefined {
    const candidates = [...lexicalScopes.map(scope => `${scope}::${constant}`), constant];

    for (const candidate of candidates) {
      const entry = this.constants.get(candidate);
      if (entry) {
        return { ...entry, constantName: candidate };
      }
    }

    return undefined;
  }

  private scanNode(node: Node, namespace: string[]): void {
    if (SKIPPED_NODE_TYPES.has(node.type)) return;

    switch (node.type) {
      case 'class':
      case 'module': {
        const nameNode = node.childForFieldName('name');
        const name = constantName(nameNode);
        const inner = !name
          ? namespace
          : nameNode && isRootScoped(nameNode)
            ? [name]
            : [...namespace, name];

        for (const child of namedChildrenOf(node)) {
          if (child.id !== nameNode?.id) {
            this.scanNode(child, inner);
          }
        }
        return;
      }
      case 'assignment':
        this.processAssignment(node, namespace);
        return;
      default:
        for (const child of namedChildrenOf(node)) {
          this.scanNode(child, namespace);
        }
    }
  }

  private processAssignment(node: Node, namespace: string[]): void {
    const target = node.childForFieldName('left');
    const value = node.childForFieldName('right');
    if (!target || !value || value.type !== 'call') return;

    const targetName = constantName(target);
    if (!targetName) return;

    const method = methodName(value);
    const client = constantName(receiverOf(value));
    if (!method || !client || !isMetricFactory(method) || !this.rules.metricReceivers.includes(client)) {
      return;
    }

    const nameArgument = positionalArguments(value)[0];
    const metricName = nameArgument
      ? stringLiteralValue(nameArgument) ?? symbolLiteralValue(nameArgument)
      : null;
    if (metricName === null) return;

    const qualified = isRootScoped(target) || namespace.length === 0
      ? targetName
      : `${namespace.join('::')}::${targetName}`;

    this.constants.set(qualified, { name: metricName, type: inferMetricType(method) });
  }
}
