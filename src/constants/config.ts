/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  DEFAULT_PRIM: 'World',
  STRIP_ROOT: true,
  NEST_MATERIALS: true,
  VARIANT_SET_NAME: 'modelVariant',
  UP_AXIS: 'Z' as const,
  METERS_PER_UNIT: 0.01,
  RELATIVE_PATHS: true,
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  USD: '.usd',
  USDA: '.usda',
  USDC: '.usdc',
  SIDECAR: '.meta.json',
  TEMP: '.tmp',
} as const;

/**
 * Fragment extensions in lookup order
 */
export const FRAGMENT_EXTENSIONS = [
  FILE_EXTENSIONS.USD,
  FILE_EXTENSIONS.USDA,
  FILE_EXTENSIONS.USDC,
] as const;

/**
 * File Names
 */
export const FILE_NAMES = {
  HIERARCHY_INDEX: '_hierarchy.txt',
  STAGE_SUFFIX: '_stage.usda',
} as const;

/**
 * Leading bytes of each layer encoding
 */
export const LAYER_MAGIC = {
  USDA: '#usda',
  USDC: 'PXR-USDC',
} as const;
