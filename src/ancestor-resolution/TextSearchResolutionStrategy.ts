/**
 * Text-search fallback
 *
 * Scans Ruby files under app/ and lib/ for a `class <Name>` line, then for a
 * `module <Name>` line. File contents are read once per strategy instance.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import type { AncestorResolutionStrategy } from './types.js';
import { isTestPath } from './path-utils.js';

interface SourceFile {
  path: string;
  content: string;
}

const SEARCH_PATTERN = '{app,lib}/**/*.rb';
const DEFINITION_KEYWORDS = ['class', 'module'];

export class TextSearchResolutionStrategy implements AncestorResolutionStrategy {
  readonly name = 'text-search';
  private readonly repoRoot: string;
  private sourceFiles: Promise<SourceFile[]> | null = null;

  constructor(repoRoot: string) {
    this.repoRoot = path.resolve(repoRoot);
  }

  async resolve(name: string): Promise<string | null> {
    const files = await this.loadSourceFiles();
    const escaped = escapeRegExp(name.replace(/^::/, ''));

    for (const keyword of DEFINITION_KEYWORDS) {
      const definition = new RegExp(`^\\s*${keyword}\\s+${escaped}(?![\\w:])`, 'm');
      const match = files.find(file => definition.test(file.content));
      if (match) {
        return match.path;
      }
    }

    return null;
  }

  private loadSourceFiles(): Promise<SourceFile[]> {
    if (!this.sourceFiles) {
      this.sourceFiles = this.readSourceFiles();
    }
    return this.sourceFiles;
  }

  private async readSourceFiles(): Promise<SourceFile[]> {
    const matches = await glob(SEARCH_PATTERN, { cwd: this.repoRoot, absolute: true, nodir: true });
    const candidates = matches.filter(match => !isTestPath(match, this.repoRoot)).sort();

    const files: SourceFile[] = [];
    for (const filePath of candidates) {
      try {
        files.push({ path: filePath, content: await fs.readFile(filePath, 'utf8') });
      } catch {
        // Unreadable files cannot define anything we can use
        continue;
      }
    }
    return files;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
