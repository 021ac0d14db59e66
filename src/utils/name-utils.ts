/**
 * Name Utilities
 *
 * Utilities for turning scene-object names and file paths into
 * prim names and asset paths.
 */

import * as path from 'path';
import { NAME_SANITIZATION_PATTERN, USD_DEFAULT_NAMES } from '../constants/usd';

/**
 * Converts a name to a valid USD prim name.
 *
 * Every character outside [A-Za-z0-9_] becomes an underscore and a
 * leading digit gets an underscore prefix. Runs of underscores are kept:
 * they can be part of an object name the user relies on.
 */
export function makeValidPrimName(name: string): string {
  const sanitized = name.replace(NAME_SANITIZATION_PATTERN, '_');

  if (sanitized.length === 0) {
    return USD_DEFAULT_NAMES.UNNAMED_PRIM;
  }

  if (/^[0-9]/.test(sanitized)) {
    return '_' + sanitized;
  }

  return sanitized;
}

/**
 * Converts a file path to a forward-slash path
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/').replace(/\\/g, '/');
}

/**
 * Builds the asset path a composition arc uses to reach a fragment.
 * Relative paths are anchored with './' so they resolve against the layer.
 * Example: ('/export/Chair.usda', '/export') -> './Chair.usda'
 */
export function toAssetPath(filePath: string, documentDir: string, relative: boolean): string {
  if (!relative) {
    return toPosixPath(path.resolve(filePath));
  }

  const relativePath = toPosixPath(path.relative(documentDir, filePath));
  if (relativePath.startsWith('../') || relativePath.startsWith('/')) {
    return relativePath;
  }
  return `./${relativePath}`;
}

/**
 * Get basename of file without extension
 * Example: "/path/to/Chair_VARIANT1.usda" -> "Chair_VARIANT1"
 */
export function getBasenameWithoutExt(filePath: string): string {
  const basename = path.basename(filePath);
  return basename.replace(/\.[^/.]+$/, '');
}
