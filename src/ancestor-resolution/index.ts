/**
 * Ancestor resolution: superclass / mixin name → defining file
 */

export { AncestorResolver, MAX_ANCESTOR_DEPTH } from './AncestorResolver.js';
export { ConventionResolutionStrategy } from './ConventionResolutionStrategy.js';
export { TextSearchResolutionStrategy } from './TextSearchResolutionStrategy.js';
export { constantToRelativePath, isTestPath, toUnixPath } from './path-utils.js';
export type {
  AncestorNode,
  AncestorResolutionStrategy,
  AncestorResolverOptions,
  StructureProvider,
} from './types.js';
