/**
 * WASM loader for tree-sitter parsers in Node.js
 * Note: Browser environments are not supported
 */

import { createRequire } from 'module';
import { Language, Parser } from 'web-tree-sitter';
import type { WasmLoaderConfig, LoadedParser, SupportedLanguage } from './types.js';

const GRAMMAR_WASM_FILES: Record<SupportedLanguage, string> = {
  ruby: 'tree-sitter-ruby/tree-sitter-ruby.wasm',
};

/**
 * WASM loader for Node.js environments
 */
export class WasmLoader {
  private static parserInstances = new Map<string, LoadedParser>();
  private static runtimeReady: Promise<void> | null = null;

  /**
   * Load tree-sitter and a language grammar
   */
  static async loadParser(
    language: SupportedLanguage,
    config: WasmLoaderConfig = { environment: 'node' }
  ): Promise<LoadedParser> {
    const cacheKey = this.cacheKey(language, config);

    const cached = this.parserInstances.get(cacheKey);
    if (cached) {
      return cached;
    }

    const parser = await this.loadNodeParser(language, config);
    this.parserInstances.set(cacheKey, parser);
    return parser;
  }

  /**
   * Load a parser for Node.js environment
   * Uses WASM files from node_modules unless a path is configured
   */
  private static async loadNodeParser(
    language: SupportedLanguage,
    config: WasmLoaderConfig
  ): Promise<LoadedParser> {
    // Parser.init() sets up module-global state, run it once
    if (!this.runtimeReady) {
      this.runtimeReady = Parser.init();
    }
    await this.runtimeReady;

    const wasmPath = config.languageWasmUrl ?? this.resolveGrammarPath(language);

    const parser = new Parser();
    const languageInstance = await Language.load(wasmPath);
    parser.setLanguage(languageInstance);

    return { parser, language: languageInstance };
  }

  private static resolveGrammarPath(language: SupportedLanguage): string {
    const require = createRequire(import.meta.url);
    const specifier = GRAMMAR_WASM_FILES[language];
    try {
      return require.resolve(specifier);
    } catch (error) {
      throw new Error(
        `Grammar for ${language} not found (${specifier}): ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private static cacheKey(language: SupportedLanguage, config: WasmLoaderConfig): string {
    return `${language}-${config.environment}-${config.languageWasmUrl ?? 'default'}`;
  }

  /**
   * Clear the parser cache
   * Useful for tests or reloading
   */
  static clearCache(): void {
    this.parserInstances.clear();
  }

  /**
   * Check if a parser is already cached
   */
  static isCached(language: SupportedLanguage, config: WasmLoaderConfig = { environment: 'node' }): boolean {
    return this.parserInstances.has(this.cacheKey(language, config));
  }
}
