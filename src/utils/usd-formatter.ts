/**
 * USD Formatter
 *
 * Formats values into USDA syntax.
 * USD has specific syntax requirements, so we centralize this to keep things consistent.
 */

/**
 * Global precision for floating point numbers in USD output.
 */
export const USD_FLOAT_PRECISION = 7;

/**
 * Converts an array of strings to USD array syntax.
 * Example: ['item1', 'item2'] -> '[item1, item2]'
 * Use this for arrays whose items are already formatted.
 */
export function formatUsdArray(items: string[]): string {
  if (items.length === 0) {
    return '[]';
  }
  return `[${items.join(', ')}]`;
}

/**
 * Converts an array of strings to USD quoted array syntax.
 * Example: ['GeomModelAPI'] -> '["GeomModelAPI"]'
 */
export function formatUsdQuotedArray(items: string[]): string {
  return formatUsdArray(items.map(formatUsdString));
}

/**
 * Quotes a string or token value.
 * Example: 'component' -> '"component"'
 */
export function formatUsdString(value: string): string {
  return JSON.stringify(value);
}

/**
 * Wraps an asset path in USD asset delimiters.
 * Paths that themselves contain '@' use the triple-delimited form.
 * Example: './Chair.usda' -> '@./Chair.usda@'
 */
export function formatUsdAssetPath(assetPath: string): string {
  if (assetPath.includes('@')) {
    return `@@@${assetPath}@@@`;
  }
  return `@${assetPath}@`;
}

/**
 * Formats a floating point number with consistent precision.
 * Example: 0.01 -> "0.01" (not "0.010000000000000000208")
 */
export function formatUsdFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  return value.toFixed(USD_FLOAT_PRECISION).replace(/\.?0+$/, '');
}

/**
 * Formats a scalar metadata or attribute value.
 * Strings are quoted, numbers and booleans are written bare.
 */
export function formatUsdScalar(value: string | number | boolean): string {
  if (typeof value === 'string') {
    return formatUsdString(value);
  }
  if (typeof value === 'number') {
    return formatUsdFloat(value);
  }
  return value ? 'true' : 'false';
}
