/**
 * Types for WASM loader module
 */

import type { Language, Parser } from 'web-tree-sitter';

/**
 * Configuration for WasmLoader
 */
export interface WasmLoaderConfig {
  environment: 'node';
  /**
   * Absolute path to a grammar `.wasm` file.
   * Defaults to the file shipped with the grammar package in node_modules.
   */
  languageWasmUrl?: string;
}

export interface LoadedParser {
  parser: Parser;
  language: Language;
}

export type SupportedLanguage = 'ruby';
