/**
 * Error Constants for the Stage Assembler
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  SCHEMA_VALIDATION_ERROR: 'USD_SCHEMA_VALIDATION_ERROR',
  CONFIG_VALIDATION_ERROR: 'USD_CONFIG_VALIDATION_ERROR',
  ASSEMBLY_ERROR: 'USD_ASSEMBLY_ERROR',
  FILE_SYSTEM_ERROR: 'USD_FILE_SYSTEM_ERROR',
  INCOMPLETE_HIERARCHY: 'USD_INCOMPLETE_HIERARCHY',
  AMBIGUOUS_SIBLING: 'USD_AMBIGUOUS_SIBLING',
  NESTED_VARIANT: 'USD_NESTED_VARIANT',
  USDA_SYNTAX_ERROR: 'USDA_SYNTAX_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  INVALID_CONFIG: 'Invalid configuration',
  INVALID_SIDECAR: 'Invalid fragment sidecar',
  INVALID_EXPORT_DIR: 'Export directory does not exist',
  MISSING_FRAGMENT: 'Fragment file not found',
  UNREADABLE_SIDECAR: 'Could not read fragment sidecar',
  WRITE_FAILED: 'Could not write file',
  EMPTY_BATCH: 'No fragments found in export directory',
} as const;

/**
 * Recoverable conditions collected alongside a successful result
 */
export const WARNING_KINDS = {
  MALFORMED_SUFFIX: 'MalformedSuffix',
  WRAPPER_SHAPE_MISMATCH: 'WrapperShapeMismatch',
  UNSUPPORTED_FRAGMENT_FORMAT: 'UnsupportedFragmentFormat',
  INSTANCEABLE_WITH_CHILDREN: 'InstanceableWithChildren',
} as const;
