/**
 * Ruby Source Parser
 *
 * Thin wrapper over the tree-sitter Ruby grammar. tree-sitter always produces
 * a tree, so a tree containing ERROR or MISSING nodes is reported as a parse
 * failure instead: callers treat the file as contributing nothing.
 */

import type { Node, Parser } from 'web-tree-sitter';
import { WasmLoader } from '../wasm/WasmLoader.js';
import type { WasmLoaderConfig } from '../wasm/types.js';
import type { ParseFailure, ParseResult, VisitOutcome } from './types.js';
import { childrenOf } from './node-utils.js';

export class RubySourceParser {
  private parser: Parser | null = null;
  private readonly config: WasmLoaderConfig;

  constructor(config: WasmLoaderConfig = { environment: 'node' }) {
    this.config = config;
  }

  /**
   * Initialize the parser using WasmLoader
   */
  async initialize(): Promise<void> {
    if (this.parser) return;

    const { parser } = await WasmLoader.loadParser('ruby', this.config);
    this.parser = parser;
  }

  /**
   * Parse Ruby source. On success the caller owns the tree and must call
   * `tree.delete()` once done with it.
   */
  async parse(source: string, filePath: string = '(source)'): Promise<ParseResult> {
    const parser = await this.ready();
    const tree = parser.parse(source);

    if (!tree) {
      return {
        success: false,
        filePath,
        failure: { filePath, message: 'Parser returned no tree' },
      };
    }

    if (tree.rootNode.hasError) {
      const failure = this.describeSyntaxError(tree.rootNode, filePath);
      tree.delete();
      return { success: false, filePath, failure };
    }

    return { success: true, filePath, tree };
  }

  /**
   * Parse, hand the root node to `visit`, and free the tree afterwards
   */
  async visit<T>(
    source: string,
    filePath: string,
    visit: (rootNode: Node) => T
  ): Promise<VisitOutcome<T>> {
    const result = await this.parse(source, filePath);
    if (!result.success) {
      return { success: false, failure: result.failure };
    }

    try {
      return { success: true, value: visit(result.tree.rootNode) };
    } finally {
      result.tree.delete();
    }
  }

  private async ready(): Promise<Parser> {
    await this.initialize();
    if (!this.parser) {
      throw new Error('Ruby parser failed to initialize');
    }
    return this.parser;
  }

  private describeSyntaxError(root: Node, filePath: string): ParseFailure {
    const errorNode = this.findFirstError(root);
    if (!errorNode) {
      return { filePath, message: 'Syntax error' };
    }

    const line = errorNode.startPosition.row + 1;
    const message = errorNode.isMissing
      ? `Syntax error: missing ${errorNode.type} at line ${line}`
      : `Syntax error: unexpected input at line ${line}`;
    return { filePath, message, line };
  }

  private findFirstError(node: Node): Node | null {
    if (node.isError || node.isMissing) {
      return node;
    }

    for (const child of childrenOf(node)) {
      if (child.hasError || child.isMissing) {
        const found = this.findFirstError(child);
        if (found) return found;
      }
    }

    return null;
  }
}
