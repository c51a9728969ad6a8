/**
 * Ancestor Resolution Types
 *
 * Types for resolving superclasses and mixed-in modules to the files that
 * define them, so that signals defined there are attributed to subclasses.
 */

import type { FileStructure } from '../signal-detection/types.js';

/**
 * Ancêtre résolu (superclasse ou module inclus/préfixé)
 */
export interface AncestorNode {
  /** Nom tel qu'écrit dans la source (ex: "Admin::BaseController") */
  name: string;
  /** Chemin absolu du fichier qui le définit */
  file: string;
  /** Distance depuis le fichier modifié (1 = parent direct) */
  depth: number;
  /** class pour une superclasse, module pour include/prepend */
  kind: 'class' | 'module';
}

/**
 * Stratégie de résolution nom → fichier.
 * Les stratégies sont essayées dans l'ordre; la première qui trouve gagne.
 */
export interface AncestorResolutionStrategy {
  /** Nom court, utilisé pour le debug */
  readonly name: string;

  /**
   * @param name - Nom de classe/module tel qu'écrit
   * @param currentFile - Fichier contenant la référence
   * @returns Chemin absolu, ou null si introuvable
   */
  resolve(name: string, currentFile: string): Promise<string | null>;
}

/**
 * Fournit la structure (classes, relations) d'un fichier ancêtre.
 * null si le fichier est illisible ou invalide.
 */
export interface StructureProvider {
  getStructure(filePath: string): Promise<FileStructure | null>;
}

/**
 * Options pour l'AncestorResolver
 */
export interface AncestorResolverOptions {
  /**
   * Debug mode: log des résolutions
   * @default false
   */
  debug?: boolean;
}
