/**
 * WASM loader module exports
 */

export { WasmLoader } from './WasmLoader.js';
export type { WasmLoaderConfig, LoadedParser, SupportedLanguage } from './types.js';
