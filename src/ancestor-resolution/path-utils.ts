/**
 * Path utilities for ancestor resolution
 */

import * as fs from 'fs/promises';
import path from 'path';

/**
 * Regex to match both Unix and Windows path separators
 */
export const PATH_SEP_REGEX = /[\\/]/;

const EXCLUDED_DIRECTORY_REGEX = /(^|\/)(spec|test)\//;
const EXCLUDED_SUFFIXES = ['_spec.rb', '_test.rb'];

/**
 * Normalize path separators to Unix style (forward slashes)
 */
export function toUnixPath(p: string): string {
  return p.split(PATH_SEP_REGEX).join('/');
}

/**
 * Expected relative path of a constant, without extension
 *
 * @example
 * constantToRelativePath('PaymentService')          // 'payment_service'
 * constantToRelativePath('Admin::BaseController')   // 'admin/base_controller'
 * constantToRelativePath('HTTPClient')              // 'http_client'
 */
export function constantToRelativePath(name: string): string {
  return name
    .replace(/^::/, '')
    .replace(/::/g, '/')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

/**
 * Whether a file belongs to a test suite (spec/ or test/ directories,
 * *_spec.rb, *_test.rb). Paths inside the repository are checked relative
 * to its root so that the root's own location never matters.
 */
export function isTestPath(filePath: string, repoRoot: string): boolean {
  const relative = path.relative(repoRoot, filePath);
  const checked = toUnixPath(relative.startsWith('..') || path.isAbsolute(relative) ? filePath : relative);

  return EXCLUDED_DIRECTORY_REGEX.test(checked) || EXCLUDED_SUFFIXES.some(suffix => checked.endsWith(suffix));
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
