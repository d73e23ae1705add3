/**
 * Path Utilities
 */

import { extname, basename, relative, sep } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Path of `target` relative to `root`, always with forward slashes
 */
export function toPosixRelative(root: string, target: string): string {
  return relative(root, target).split(sep).join('/');
}
