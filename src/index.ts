/**
 * ruby-signal-extractor
 *
 * Static extraction of observability signals (logs, metrics) from Ruby
 * source, using tree-sitter WASM bindings.
 *
 * ## Recommended API (use these):
 * - SignalCollector - Signals of changed files and their ancestors
 * - filterInterpolatedLogs, SignalLimits - Post-processing
 * - LintRunner, InterpolatedLogsRule - Log-quality lint
 *
 * ## Building blocks:
 * - RubySourceParser, SignalVisitor - Single-file parse and detection
 * - AncestorResolver, ConstantResolver - Cross-file resolution
 */

// =============================================================================
// PUBLIC API - Recommended for external use
// =============================================================================

export * from './signal-collection/index.js';
export * from './validation/index.js';
export * from './linting/index.js';

// =============================================================================
// BUILDING BLOCKS
// =============================================================================

export * from './ruby/index.js';
export * from './signal-detection/index.js';
export * from './constant-resolution/index.js';
export * from './ancestor-resolution/index.js';

/**
 * @internal WASM loader utilities
 */
export { WasmLoader } from './wasm/index.js';
export type { SupportedLanguage, WasmLoaderConfig } from './wasm/index.js';
