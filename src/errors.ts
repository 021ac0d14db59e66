/**
 * Custom Error Classes for Stage Assembly
 *
 * Tagged union of fatal errors. Recoverable conditions are not thrown;
 * they travel as `AssemblyWarning` values instead.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

function formatZodIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Base USD Error Class
 *
 * Base error class for all assembly operations with tagged union pattern.
 */
export abstract class BaseUsdError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * USD Schema Validation Error
 *
 * Sidecar metadata that fails its Zod schema.
 */
export class UsdSchemaError extends BaseUsdError {
  readonly _tag = 'UsdSchemaError' as const;
  readonly code = ERROR_CODES.SCHEMA_VALIDATION_ERROR;
  readonly path: string;
  readonly zodError?: ZodError;

  constructor(message: string, path: string, zodError?: ZodError) {
    super(message, { path, zodError });
    this.path = path;
    this.zodError = zodError;
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(formatZodIssue) || [];
  }
}

/**
 * USD Configuration Error
 */
export class UsdConfigError extends BaseUsdError {
  readonly _tag = 'UsdConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * USD Assembly Error
 *
 * Batch-level failure outside the hierarchy rules (empty batch, bad input).
 */
export class UsdAssemblyError extends BaseUsdError {
  readonly _tag = 'UsdAssemblyError' as const;
  readonly code = ERROR_CODES.ASSEMBLY_ERROR;
  readonly stage: string;

  constructor(message: string, stage: string, context?: Record<string, unknown>) {
    super(message, { stage, ...context });
    this.stage = stage;
  }
}

/**
 * USD File System Error
 */
export class UsdFileSystemError extends BaseUsdError {
  readonly _tag = 'UsdFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Incomplete Hierarchy Error
 *
 * An ancestor name is declared by no record in the batch.
 */
export class IncompleteHierarchyError extends BaseUsdError {
  readonly _tag = 'IncompleteHierarchy' as const;
  readonly code = ERROR_CODES.INCOMPLETE_HIERARCHY;
  readonly objectName: string;
  readonly missingAncestor: string;

  constructor(message: string, objectName: string, missingAncestor: string, context?: Record<string, unknown>) {
    super(message, { objectName, missingAncestor, ...context });
    this.objectName = objectName;
    this.missingAncestor = missingAncestor;
  }
}

/**
 * Ambiguous Sibling Error
 *
 * Two siblings resolve to the same prim with nothing to tell them apart.
 */
export class AmbiguousSiblingError extends BaseUsdError {
  readonly _tag = 'AmbiguousSibling' as const;
  readonly code = ERROR_CODES.AMBIGUOUS_SIBLING;
  readonly primPath: string;
  readonly objectNames: readonly string[];

  constructor(message: string, primPath: string, objectNames: readonly string[], context?: Record<string, unknown>) {
    super(message, { primPath, objectNames, ...context });
    this.primPath = primPath;
    this.objectNames = objectNames;
  }
}

/**
 * Nested Variant Error
 *
 * A variant member placed under another member of the same variant group.
 */
export class NestedVariantError extends BaseUsdError {
  readonly _tag = 'NestedVariant' as const;
  readonly code = ERROR_CODES.NESTED_VARIANT;
  readonly objectName: string;
  readonly ancestorName: string;

  constructor(message: string, objectName: string, ancestorName: string, context?: Record<string, unknown>) {
    super(message, { objectName, ancestorName, ...context });
    this.objectName = objectName;
    this.ancestorName = ancestorName;
  }
}

/**
 * USDA Syntax Error
 *
 * Fragment text the outline parser cannot follow.
 */
export class UsdaSyntaxError extends BaseUsdError {
  readonly _tag = 'UsdaSyntaxError' as const;
  readonly code = ERROR_CODES.USDA_SYNTAX_ERROR;
  readonly line: number;

  constructor(message: string, line: number, context?: Record<string, unknown>) {
    super(`${message} (line ${line})`, { line, ...context });
    this.line = line;
  }
}

/**
 * Union type for all assembly errors
 */
export type UsdError =
  | UsdSchemaError
  | UsdConfigError
  | UsdAssemblyError
  | UsdFileSystemError
  | IncompleteHierarchyError
  | AmbiguousSiblingError
  | NestedVariantError
  | UsdaSyntaxError;

/**
 * Error factory functions
 */
export const UsdErrorFactory = {
  /**
   * Create schema validation error
   */
  schemaError(message: string, path: string, zodError?: ZodError): UsdSchemaError {
    return new UsdSchemaError(message, path, zodError);
  },

  /**
   * Create schema validation error listing every failed field
   */
  validationError(message: string, path: string, zodError: ZodError): UsdSchemaError {
    const issues = zodError.issues.map(formatZodIssue).join('; ');
    return new UsdSchemaError(`${message}: ${issues}`, path, zodError);
  },

  /**
   * Create configuration error
   */
  configError(message: string, configKey: string, context?: Record<string, unknown>): UsdConfigError {
    return new UsdConfigError(message, configKey, context);
  },

  /**
   * Create assembly error
   */
  assemblyError(message: string, stage: string, context?: Record<string, unknown>): UsdAssemblyError {
    return new UsdAssemblyError(message, stage, context);
  },

  /**
   * Create file system error
   */
  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): UsdFileSystemError {
    return new UsdFileSystemError(message, filePath, operation, context);
  },

  incompleteHierarchy(objectName: string, missingAncestor: string, parentPath: readonly string[]): IncompleteHierarchyError {
    return new IncompleteHierarchyError(
      `Ancestor '${missingAncestor}' of '${objectName}' is not present in the batch`,
      objectName,
      missingAncestor,
      { parentPath }
    );
  },

  nestedVariant(objectName: string, ancestorName: string, parentPath: readonly string[]): NestedVariantError {
    return new NestedVariantError(
      `Variant '${objectName}' cannot be under variant '${ancestorName}'`,
      objectName,
      ancestorName,
      { parentPath }
    );
  },

  syntaxError(message: string, line: number): UsdaSyntaxError {
    return new UsdaSyntaxError(message, line);
  },

  ambiguousSibling(primPath: string, objectNames: readonly string[]): AmbiguousSiblingError {
    return new AmbiguousSiblingError(
      `Siblings ${objectNames.map(name => `'${name}'`).join(' and ')} both resolve to '${primPath}'`,
      primPath,
      objectNames
    );
  },
};

/**
 * Narrow an unknown thrown value to one of our errors
 */
export function isUsdError(error: unknown): error is UsdError {
  return error instanceof BaseUsdError;
}
