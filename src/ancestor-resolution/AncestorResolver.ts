/**
 * Ancestor Resolver
 *
 * Walks superclasses and included/prepended modules of the classes in a file,
 * resolving each name to the file that defines it. Results are memoized per
 * resolver instance by the name as written.
 *
 * Extended modules are recorded by the visitor but never walked: `extend`
 * adds singleton methods, not instance behavior.
 */

import type { ClassStructure, FileStructure, ModuleRelation } from '../signal-detection/types.js';
import { ConventionResolutionStrategy } from './ConventionResolutionStrategy.js';
import { TextSearchResolutionStrategy } from './TextSearchResolutionStrategy.js';
import { isFile } from './path-utils.js';
import type {
  AncestorNode,
  AncestorResolutionStrategy,
  AncestorResolverOptions,
  StructureProvider,
} from './types.js';

export const MAX_ANCESTOR_DEPTH = 5;

interface AncestorReference {
  name: string;
  kind: AncestorNode['kind'];
}

export class AncestorResolver {
  private readonly cache = new Map<string, string | null>();
  private readonly structures: StructureProvider;
  private readonly strategies: AncestorResolutionStrategy[];
  private readonly debug: boolean;

  constructor(
    structures: StructureProvider,
    strategies: AncestorResolutionStrategy[],
    options: AncestorResolverOptions = {}
  ) {
    this.structures = structures;
    this.strategies = strategies;
    this.debug = options.debug ?? false;
  }

  /**
   * Resolver using naming conventions first, then a text search of app/ and lib/
   */
  static forRepository(
    repoRoot: string,
    structures: StructureProvider,
    options: AncestorResolverOptions = {}
  ): AncestorResolver {
    return new AncestorResolver(
      structures,
      [new ConventionResolutionStrategy(repoRoot), new TextSearchResolutionStrategy(repoRoot)],
      options
    );
  }

  /**
   * Resolve a class or module name to its defining file.
   * Misses are cached too.
   */
  async resolve(name: string, currentFile: string): Promise<string | null> {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    let resolved: string | null = null;
    for (const strategy of this.strategies) {
      resolved = await strategy.resolve(name, currentFile);
      if (resolved) {
        if (this.debug) {
          console.log(`[AncestorResolver] ${name} → ${resolved} (${strategy.name})`);
        }
        break;
      }
    }

    if (!resolved && this.debug) {
      console.log(`[AncestorResolver] ${name} not found`);
    }

    this.cache.set(name, resolved);
    return resolved;
  }

  /**
   * Ancestors of every class in `structure`, depth-first, superclasses before
   * included modules before prepended modules. A name is visited at most once
   * per walk and nothing deeper than MAX_ANCESTOR_DEPTH is returned.
   */
  async collectAncestors(
    structure: FileStructure,
    currentFile: string,
    depth: number = 0,
    visited: Set<string> = new Set()
  ): Promise<AncestorNode[]> {
    if (depth >= MAX_ANCESTOR_DEPTH) {
      return [];
    }

    const ancestors: AncestorNode[] = [];

    for (const reference of this.referencesOf(structure)) {
      if (visited.has(reference.name)) continue;

      const file = await this.resolve(reference.name, currentFile);
      if (!file || !(await isFile(file))) continue;

      visited.add(reference.name);
      ancestors.push({ name: reference.name, file, depth: depth + 1, kind: reference.kind });

      const ancestorStructure = await this.structures.getStructure(file);
      if (ancestorStructure) {
        ancestors.push(...(await this.collectAncestors(ancestorStructure, file, depth + 1, visited)));
      }
    }

    return ancestors;
  }

  private referencesOf(structure: FileStructure): AncestorReference[] {
    const superclasses = structure.classes.flatMap((cls: ClassStructure): AncestorReference[] =>
      cls.parentName ? [{ name: cls.parentName, kind: 'class' }] : []
    );
    const modulesOf = (kind: ModuleRelation['kind']): AncestorReference[] =>
      structure.relations
        .filter(relation => relation.kind === kind)
        .map(relation => ({ name: relation.moduleName, kind: 'module' as const }));

    return [...superclasses, ...modulesOf('include'), ...modulesOf('prepend')];
  }
}
