/**
 * Helpers for reading tree-sitter-ruby nodes
 */

import type { Node } from 'web-tree-sitter';

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  s: ' ',
  e: '\x1b',
  '0': '\0',
};

/**
 * All children, anonymous tokens included
 */
export function childrenOf(node: Node): Node[] {
  return node.children.filter((child): child is Node => child !== null);
}

export function namedChildrenOf(node: Node): Node[] {
  return node.namedChildren.filter((child): child is Node => child !== null);
}

/**
 * 1-based line of a node
 */
export function lineOf(node: Node): number {
  return node.startPosition.row + 1;
}

/**
 * Render a constant reference as written, `Foo` or `Foo::Bar::Baz`.
 * A leading `::` is dropped. Returns null for anything that is not a
 * constant path (method calls through `::`, expressions).
 *
 * @example
 * constantName(`Admin::BaseController`) // 'Admin::BaseController'
 * constantName(`::StatsD`)              // 'StatsD'
 * constantName(`Struct.new(:a)`)        // null
 */
export function constantName(node: Node | null): string | null {
  if (!node) return null;

  if (node.type === 'constant') {
    return node.text;
  }

  if (node.type === 'scope_resolution') {
    const name = node.childForFieldName('name');
    if (!name || name.type !== 'constant') return null;

    const scope = node.childForFieldName('scope');
    if (!scope) return name.text;

    const parent = constantName(scope);
    return parent ? `${parent}::${name.text}` : null;
  }

  return null;
}

/**
 * True for `::Foo` style references, which ignore the lexical namespace
 */
export function isRootScoped(node: Node): boolean {
  if (node.type !== 'scope_resolution') return false;
  const scope = node.childForFieldName('scope');
  return scope ? isRootScoped(scope) : true;
}

/**
 * Arguments of a call, keyword pairs and block arguments excluded
 */
export function positionalArguments(call: Node): Node[] {
  const args = call.childForFieldName('arguments');
  if (!args) return [];

  return namedChildrenOf(args).filter(
    arg =>
      arg.type !== 'comment' &&
      arg.type !== 'pair' &&
      arg.type !== 'block_argument' &&
      arg.type !== 'hash_splat_argument'
  );
}

export function methodName(call: Node): string | null {
  return call.childForFieldName('method')?.text ?? null;
}

export function receiverOf(call: Node): Node | null {
  return call.childForFieldName('receiver');
}

const CONTENT_NODE_TYPES = new Set(['string_content', 'heredoc_content']);

/**
 * Nodes holding the text of a string argument: the string itself, each
 * piece of `"a" "b"`, or the body of a heredoc whose opener (`<<~MSG`) is
 * the argument. null for anything that is not a string.
 */
export function stringSegments(node: Node): Node[] | null {
  switch (node.type) {
    case 'string':
      return [node];
    case 'chained_string':
      return namedChildrenOf(node).filter(child => child.type === 'string');
    case 'heredoc_beginning': {
      const body = heredocBodyOf(node);
      return body ? [body] : null;
    }
    default:
      return null;
  }
}

/**
 * Body of a heredoc opener. The grammar attaches bodies after the line
 * that opens them, in the same order as their openers.
 */
export function heredocBodyOf(beginning: Node): Node | null {
  const beginnings: Node[] = [];
  const bodies: Node[] = [];
  collectHeredocNodes(beginning.tree.rootNode, beginnings, bodies);

  const index = beginnings.findIndex(candidate => candidate.id === beginning.id);
  return index >= 0 ? bodies[index] ?? null : null;
}

function collectHeredocNodes(node: Node, beginnings: Node[], bodies: Node[]): void {
  for (const child of namedChildrenOf(node)) {
    if (child.type === 'heredoc_beginning') {
      beginnings.push(child);
    } else if (child.type === 'heredoc_body') {
      bodies.push(child);
    }
    collectHeredocNodes(child, beginnings, bodies);
  }
}

/**
 * `#{...}` nodes of a string-like node, in order
 */
export function interpolationsOf(node: Node): Node[] {
  return (stringSegments(node) ?? [node]).flatMap(segment =>
    namedChildrenOf(segment).filter(child => child.type === 'interpolation')
  );
}

export function isInterpolatedString(node: Node): boolean {
  if (node.type !== 'delimited_symbol' && !stringSegments(node)) return false;
  return interpolationsOf(node).length > 0;
}

/**
 * Value of a string literal without interpolation, null otherwise
 */
export function stringLiteralValue(node: Node): string | null {
  if (!stringSegments(node) || isInterpolatedString(node)) return null;
  return literalFragments(node).join('');
}

/**
 * Name of a literal symbol (`:foo`, `:"foo bar"`), null otherwise
 */
export function symbolLiteralValue(node: Node): string | null {
  if (node.type === 'simple_symbol') {
    return node.text.slice(1);
  }
  if (node.type === 'delimited_symbol' && !isInterpolatedString(node)) {
    return literalFragments(node).join('');
  }
  return null;
}

/**
 * Static text pieces of a string, heredoc or delimited symbol, in order.
 * Interpolations are skipped.
 */
export function literalFragments(node: Node): string[] {
  const fragments: string[] = [];
  for (const segment of stringSegments(node) ?? [node]) {
    for (const child of namedChildrenOf(segment)) {
      if (CONTENT_NODE_TYPES.has(child.type)) {
        fragments.push(child.text);
      } else if (child.type === 'escape_sequence') {
        fragments.push(decodeEscape(child.text));
      }
    }
  }
  return fragments;
}

function decodeEscape(sequence: string): string {
  const body = sequence.slice(1);

  const unicode = body.match(/^u\{?([0-9a-fA-F]+)\}?$/);
  if (unicode) {
    return String.fromCodePoint(parseInt(unicode[1], 16));
  }

  return SIMPLE_ESCAPES[body] ?? body;
}
