import type { Signal } from '../signal-collection/types.js';

/**
 * Keep the first signal per (type, name, sourceFile, definingClass), in order
 */
export function deduplicateSignals(signals: readonly Signal[]): Signal[] {
  const seen = new Set<string>();
  const unique: Signal[] = [];

  for (const signal of signals) {
    const key = JSON.stringify([signal.type, signal.name, signal.sourceFile, signal.definingClass]);
    if (seen.has(key)) continue;

    seen.add(key);
    unique.push(signal);
  }

  return unique;
}
