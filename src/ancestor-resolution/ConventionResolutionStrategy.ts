/**
 * Convention-based resolution
 *
 * `Admin::BaseController` is expected in `admin/base_controller.rb`, looked up
 * next to the referencing file, in its parent directory, in a `concerns/`
 * directory beside it, and finally anywhere under app/ or lib/.
 */

import * as path from 'path';
import { glob } from 'glob';
import type { AncestorResolutionStrategy } from './types.js';
import { constantToRelativePath, isFile, isTestPath } from './path-utils.js';

const REPOSITORY_GLOB_ROOTS = ['app', 'lib'];

export class ConventionResolutionStrategy implements AncestorResolutionStrategy {
  readonly name = 'convention';
  private readonly repoRoot: string;

  constructor(repoRoot: string) {
    this.repoRoot = path.resolve(repoRoot);
  }

  async resolve(name: string, currentFile: string): Promise<string | null> {
    const fileName = `${constantToRelativePath(name)}.rb`;
    const currentDir = path.dirname(path.resolve(currentFile));

    const nearby = [
      path.join(currentDir, fileName),
      path.join(currentDir, '..', fileName),
      path.join(currentDir, 'concerns', fileName),
    ];

    for (const candidate of nearby) {
      if (!isTestPath(candidate, this.repoRoot) && (await isFile(candidate))) {
        return candidate;
      }
    }

    for (const root of REPOSITORY_GLOB_ROOTS) {
      const matches = await glob(`${root}/**/${fileName}`, {
        cwd: this.repoRoot,
        absolute: true,
        nodir: true,
      });

      const candidates = matches.filter(match => !isTestPath(match, this.repoRoot)).sort();
      if (candidates.length > 0) {
        return candidates[0];
      }
    }

    return null;
  }
}
