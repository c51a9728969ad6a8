/**
 * Log message helpers: event names, severities, message shapes
 */

import type { Node } from 'web-tree-sitter';
import {
  constantName,
  interpolationsOf,
  literalFragments,
  methodName,
  namedChildrenOf,
  receiverOf,
  stringSegments,
  symbolLiteralValue,
} from '../ruby/node-utils.js';
import { LOG_LEVELS, isLogLevel } from './constants.js';
import type { LogLevel, LogMessage } from './types.js';

const MAX_EVENT_NAME_LENGTH = 50;

/**
 * Stable identifier from free-form log text.
 *
 * @example
 * deriveEventName('Order  shipped') // 'order_shipped'
 * deriveEventName('!!!')            // null
 */
export function deriveEventName(message: string): string | null {
  const slug = message
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_EVENT_NAME_LENGTH);

  return slug.length > 0 ? slug : null;
}

/**
 * Severity passed to `Logger#add` / `Logger#log`:
 * `:warn`, `2`, `Logger::WARN`, `Logger::Severity::WARN`
 */
export function severityOf(node: Node): LogLevel | null {
  const symbol = symbolLiteralValue(node);
  if (symbol !== null) {
    return isLogLevel(symbol) ? symbol : null;
  }

  if (node.type === 'integer') {
    const index = Number(node.text);
    return Number.isInteger(index) ? LOG_LEVELS[index] ?? null : null;
  }

  const constant = constantName(node);
  if (constant !== null) {
    const last = constant.split('::').pop()?.toLowerCase() ?? '';
    return isLogLevel(last) ? last : null;
  }

  return null;
}

export function describeMessage(node: Node | null): LogMessage {
  if (!node) {
    return { kind: 'none', source: '', staticParts: [], interpolationNames: [] };
  }

  // "...", "a" "b", <<~HEREDOC
  const segments = stringSegments(node);
  if (segments) {
    const interpolations = interpolationsOf(node);
    const source =
      node.type === 'heredoc_beginning'
        ? [node.text, ...segments.map(segment => segment.text)].join('\n')
        : node.text;

    return {
      kind: interpolations.length > 0 ? 'interpolated' : 'string',
      source,
      staticParts: literalFragments(node),
      interpolationNames: interpolations.map(interpolationName),
    };
  }

  if (symbolLiteralValue(node) !== null) {
    return { kind: 'symbol', source: node.text, staticParts: [], interpolationNames: [] };
  }

  return { kind: 'other', source: node.text, staticParts: [], interpolationNames: [] };
}

/**
 * Event name for a log message: strings are slugged, symbols kept verbatim,
 * interpolated strings keep only their literal fragments
 */
export function eventNameOf(node: Node | null, message: LogMessage): string | null {
  switch (message.kind) {
    case 'string':
    case 'interpolated':
      return deriveEventName(message.staticParts.join(''));
    case 'symbol':
      return node ? symbolLiteralValue(node) : null;
    default:
      return null;
  }
}

function interpolationName(interpolation: Node): string {
  const expression = namedChildrenOf(interpolation).find(child => child.type !== 'comment');
  return expression ? expressionName(expression) : 'value';
}

function expressionName(node: Node): string {
  switch (node.type) {
    case 'identifier':
      return node.text;
    case 'instance_variable':
    case 'class_variable':
    case 'global_variable':
      return node.text.replace(/^[@$]+/, '');
    case 'call': {
      const receiver = receiverOf(node);
      const method = methodName(node) ?? 'value';
      return receiver ? `${expressionName(receiver)}_${method}` : method;
    }
    case 'parenthesized_statements':
    case 'begin': {
      const inner = namedChildrenOf(node)[0];
      return inner ? expressionName(inner) : 'value';
    }
    default:
      return 'value';
  }
}
