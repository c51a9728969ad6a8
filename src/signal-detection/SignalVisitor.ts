/**
 * Signal Visitor
 *
 * Single depth-first pass over a Ruby tree that records:
 * - class / module definitions and their superclasses
 * - include / prepend / extend relations
 * - log calls (logger receivers, Logger#add, Loggy-style bare `log`)
 * - metric calls on known metric clients, direct or chained through a factory
 * - metric calls whose name is not a literal (dynamic)
 * - action calls on other constants, for later resolution against registered metric constants
 *
 * Traversal always continues into children, so detections nest.
 */

import type { Node } from 'web-tree-sitter';
import {
  constantName,
  isRootScoped,
  lineOf,
  methodName,
  namedChildrenOf,
  positionalArguments,
  receiverOf,
  stringLiteralValue,
  symbolLiteralValue,
} from '../ruby/node-utils.js';
import {
  DEFAULT_DETECTION_RULES,
  GENERIC_LOG_METHODS,
  METRIC_ACTION_METHODS,
  TOP_LEVEL,
  inferMetricType,
  isInclusionMethod,
  isLogLevel,
  isMetricFactory,
} from './constants.js';
import { describeMessage, eventNameOf, severityOf } from './log-messages.js';
import type {
  DetectionRules,
  LogLevel,
  MetricType,
  ModuleRelationKind,
  VisitResult,
} from './types.js';

interface ScopeFrame {
  /** null for the file's top level */
  qualifiedName: string | null;
  hasLoggingTrait: boolean;
}

interface LogMatch {
  level: LogLevel;
  message: Node | null;
}

type MetricMatch =
  | { kind: 'client'; receiver: string; metricType: MetricType; nameArgument: Node | undefined }
  | { kind: 'constant'; constantName: string; absolute: boolean; action: string };

const VARIABLE_NODE_TYPES = new Set([
  'identifier',
  'instance_variable',
  'class_variable',
  'global_variable',
]);

export class SignalVisitor {
  private readonly filePath: string;
  private readonly rules: DetectionRules;
  private frames: ScopeFrame[] = [];
  private result: VisitResult;

  constructor(filePath: string, rules: DetectionRules = DEFAULT_DETECTION_RULES) {
    this.filePath = filePath;
    this.rules = rules;
    this.result = this.emptyResult();
  }

  /**
   * Visit a parsed file. Each call starts from a clean state.
   */
  visit(rootNode: Node): VisitResult {
    this.result = this.emptyResult();
    this.frames = [{ qualifiedName: null, hasLoggingTrait: this.declaresLoggingTrait(rootNode) }];

    this.process(rootNode);

    return this.result;
  }

  private process(node: Node): void {
    switch (node.type) {
      case 'class':
        this.processDefinition(node, 'class');
        break;
      case 'module':
        this.processDefinition(node, 'module');
        break;
      case 'call':
        this.processCall(node);
        break;
      case 'program':
      case 'body_statement':
      case 'begin':
        this.processChildren(node);
        break;
      default:
        this.processChildren(node);
    }
  }

  private processChildren(node: Node, skip: ReadonlySet<number> = new Set()): void {
    for (const child of namedChildrenOf(node)) {
      if (!skip.has(child.id)) {
        this.process(child);
      }
    }
  }

  private processDefinition(node: Node, kind: 'class' | 'module'): void {
    const nameNode = node.childForFieldName('name');
    const localName = constantName(nameNode) ?? '(anonymous)';
    const enclosing = this.currentFrame().qualifiedName;
    const qualifiedName =
      enclosing && !(nameNode && isRootScoped(nameNode)) ? `${enclosing}::${localName}` : localName;

    const superclassNode = kind === 'class' ? node.childForFieldName('superclass') : null;

    this.result.structure.classes.push({
      qualifiedName,
      parentName: superclassNode ? constantName(this.superclassExpression(superclassNode)) : null,
      file: this.filePath,
      kind,
    });

    const skip = new Set<number>();
    if (nameNode) skip.add(nameNode.id);
    if (superclassNode) skip.add(superclassNode.id);

    this.frames.push({ qualifiedName, hasLoggingTrait: this.declaresLoggingTrait(node) });
    this.processChildren(node, skip);
    this.frames.pop();
  }

  private superclassExpression(superclassNode: Node): Node | null {
    if (superclassNode.type !== 'superclass') return superclassNode;
    return namedChildrenOf(superclassNode)[0] ?? null;
  }

  private processCall(node: Node): void {
    const receiver = receiverOf(node);
    const method = methodName(node);

    if (method) {
      const log = this.matchLogCall(node, receiver, method);
      const metric = log ? null : this.matchMetricCall(node, receiver, method);

      if (log) {
        this.recordLogCall(node, method, log);
      } else if (metric) {
        this.recordMetricCall(node, metric);
      } else if (!receiver && isInclusionMethod(method)) {
        this.recordModuleRelations(node, method);
      }
    }

    this.processChildren(node);
  }

  // ---------------------------------------------------------------------------
  // Logs
  // ---------------------------------------------------------------------------

  private matchLogCall(node: Node, receiver: Node | null, method: string): LogMatch | null {
    const args = positionalArguments(node);

    if (!receiver) {
      if (method !== 'log' || !this.currentFrame().hasLoggingTrait) return null;

      const first = args[0];
      const symbol = first ? symbolLiteralValue(first) : null;
      if (symbol !== null && isLogLevel(symbol)) {
        return { level: symbol, message: args[1] ?? null };
      }
      return { level: 'info', message: first ?? null };
    }

    if (!this.isLoggerReceiver(receiver)) return null;

    if (isLogLevel(method)) {
      return { level: method, message: args[0] ?? null };
    }

    if (GENERIC_LOG_METHODS.has(method)) {
      const level = args[0] ? severityOf(args[0]) : null;
      return level ? { level, message: args[1] ?? null } : null;
    }

    return null;
  }

  private isLoggerReceiver(receiver: Node): boolean {
    if (VARIABLE_NODE_TYPES.has(receiver.type)) {
      return receiver.text.includes('logger');
    }

    if (receiver.type === 'constant') {
      return this.rules.constantLoggers.includes(receiver.text);
    }

    if (receiver.type === 'call' && methodName(receiver) === 'logger') {
      const owner = receiverOf(receiver);
      if (!owner || owner.type === 'self') return true;

      const namespace = constantName(owner);
      return namespace !== null && this.rules.logNamespaces.includes(namespace);
    }

    return false;
  }

  private recordLogCall(node: Node, method: string, match: LogMatch): void {
    const message = describeMessage(match.message);

    this.result.logCalls.push({
      level: match.level,
      eventName: eventNameOf(match.message, message),
      interpolated: message.kind === 'interpolated',
      method,
      message,
      definingClass: this.definingClass(),
      line: lineOf(node),
    });
  }

  // ---------------------------------------------------------------------------
  // Metrics
  // ---------------------------------------------------------------------------

  private matchMetricCall(node: Node, receiver: Node | null, method: string): MetricMatch | null {
    if (!receiver || !METRIC_ACTION_METHODS.has(method)) return null;

    const receiverConstant = constantName(receiver);
    if (receiverConstant !== null) {
      if (this.rules.metricReceivers.includes(receiverConstant)) {
        return {
          kind: 'client',
          receiver: receiverConstant,
          metricType: inferMetricType(method),
          nameArgument: positionalArguments(node)[0],
        };
      }

      return {
        kind: 'constant',
        constantName: receiverConstant,
        absolute: isRootScoped(receiver),
        action: method,
      };
    }

    // Prometheus.counter(:name).increment
    if (receiver.type === 'call') {
      const factory = methodName(receiver);
      const client = constantName(receiverOf(receiver));

      if (factory && client && isMetricFactory(factory) && this.rules.metricReceivers.includes(client)) {
        return {
          kind: 'client',
          receiver: client,
          metricType: inferMetricType(factory),
          nameArgument: positionalArguments(receiver)[0],
        };
      }
    }

    return null;
  }

  private recordMetricCall(node: Node, match: MetricMatch): void {
    const definingClass = this.definingClass();
    const line = lineOf(node);

    if (match.kind === 'constant') {
      this.result.constantReferences.push({
        constantName: match.constantName,
        lexicalScopes: match.absolute ? [] : this.lexicalScopes(),
        action: match.action,
        definingClass,
        line,
      });
      return;
    }

    const name = match.nameArgument ? this.literalMetricName(match.nameArgument) : null;
    if (name !== null) {
      this.result.metricCalls.push({
        name,
        metricType: match.metricType,
        receiver: match.receiver,
        definingClass,
        line,
      });
    } else {
      this.result.dynamicMetricCalls.push({
        receiver: match.receiver,
        metricType: match.metricType,
        definingClass,
        file: this.filePath,
        line,
      });
    }
  }

  private literalMetricName(node: Node): string | null {
    return stringLiteralValue(node) ?? symbolLiteralValue(node);
  }

  // ---------------------------------------------------------------------------
  // Structure
  // ---------------------------------------------------------------------------

  private recordModuleRelations(node: Node, kind: ModuleRelationKind): void {
    for (const arg of positionalArguments(node)) {
      const moduleName = constantName(arg);
      if (!moduleName) continue;

      this.result.structure.relations.push({
        moduleName,
        includingClass: this.definingClass(),
        kind,
        file: this.filePath,
      });
    }
  }

  /**
   * Whether the statements directly inside a class/module body (or the file's
   * top level) include, prepend or extend one of the logging traits
   */
  private declaresLoggingTrait(node: Node): boolean {
    const statements = namedChildrenOf(node).flatMap(child =>
      child.type === 'body_statement' ? namedChildrenOf(child) : [child]
    );

    return statements.some(statement => {
      if (statement.type !== 'call' || receiverOf(statement)) return false;

      const method = methodName(statement);
      if (!method || !isInclusionMethod(method)) return false;

      return positionalArguments(statement).some(arg => {
        const name = constantName(arg);
        return name !== null && this.rules.loggingTraits.includes(name);
      });
    });
  }

  private currentFrame(): ScopeFrame {
    return this.frames[this.frames.length - 1] ?? { qualifiedName: null, hasLoggingTrait: false };
  }

  private definingClass(): string {
    return this.currentFrame().qualifiedName ?? TOP_LEVEL;
  }

  private lexicalScopes(): string[] {
    const scopes: string[] = [];
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const name = this.frames[i].qualifiedName;
      if (name) scopes.push(name);
    }
    return scopes;
  }

  private emptyResult(): VisitResult {
    return {
      filePath: this.filePath,
      structure: { classes: [], relations: [] },
      logCalls: [],
      metricCalls: [],
      constantReferences: [],
      dynamicMetricCalls: [],
    };
  }
}
