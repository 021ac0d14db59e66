/**
 * USD-Specific Constants
 *
 * Tokens, prim types and metadata keys authored by the stage assembler,
 * plus the shapes the native exporter leaves inside each fragment.
 */

/**
 * USD Node Types
 */
export const USD_NODE_TYPES = {
  XFORM: 'Xform',
  SCOPE: 'Scope',
  SKEL_ROOT: 'SkelRoot',
} as const;

/**
 * USD Default Names
 */
export const USD_DEFAULT_NAMES = {
  DEFAULT_PRIM: 'World',
  VARIANT_SET: 'modelVariant',
  DEFAULT_VARIANT: 'default',
  UNNAMED_PRIM: 'prim',
  CREATOR: 'Stage Assembler',
} as const;

/**
 * USD Metadata Keys
 */
export const USD_METADATA = {
  ACTIVE: 'active',
  ASSET_INFO: 'assetInfo',
  ASSET_VERSION: 'version',
  INSTANCEABLE: 'instanceable',
  KIND: 'kind',
  VARIANTS: 'variants',
  DEFAULT_PRIM: 'defaultPrim',
} as const;

/**
 * USD Composition Arc Keywords
 */
export const USD_ARCS = {
  REFERENCES: 'prepend references',
  PAYLOAD: 'prepend payload',
  VARIANT_SETS: 'prepend variantSets',
  API_SCHEMAS: 'prepend apiSchemas',
} as const;

/**
 * USD Attribute Declarations
 */
export const USD_ATTRIBUTES = {
  PURPOSE: 'uniform token purpose',
  VISIBILITY: 'token visibility',
  DRAW_MODE: 'uniform token model:drawMode',
} as const;

/**
 * USD Token Values
 */
export const USD_TOKENS = {
  INVISIBLE: 'invisible',
  GEOM_MODEL_API: 'GeomModelAPI',
  ASSEMBLY: 'assembly',
} as const;

/**
 * Native Exporter Shapes
 *
 * The exporter wraps every fragment in `/root` and writes materials
 * into one of these scopes beside the content.
 */
export const EXPORTER_SHAPES = {
  WRAPPER_NAME: 'root',
  MATERIAL_SCOPE_NAMES: ['mtl', 'Looks', 'Materials'] as readonly string[],
  CLASS_PREFIX: '_class_',
} as const;

/**
 * Name Sanitization Pattern
 */
export const NAME_SANITIZATION_PATTERN = /[^A-Za-z0-9_]/g;
