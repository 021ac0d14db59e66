/**
 * Base Schemas
 *
 * Token enumerations shared by the configuration, the sidecar metadata
 * and the resolved property sets.
 */

import { z } from 'zod';

/**
 * Supported Up Axes Schema
 */
export const UpAxisSchema = z.enum(['Y', 'Z']);

/**
 * Prim type requested for a node; `Auto` resolves by role
 */
export const GeomTypeSchema = z.enum(['Auto', 'Xform', 'Scope']);

/**
 * Model kind; `none` authors nothing
 */
export const KindSchema = z.enum(['none', 'assembly', 'group', 'component', 'subcomponent', 'model']);

/**
 * Imageable purpose
 */
export const PurposeSchema = z.enum(['default', 'render', 'proxy', 'guide']);

/**
 * GeomModelAPI draw mode
 */
export const DrawModeSchema = z.enum(['default', 'bounds', 'origin', 'cards']);

/**
 * USD identifier (prim names, variant set names)
 */
export const UsdIdentifierSchema = z.string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Must be a valid USD identifier');

/**
 * Absolute prim path
 */
export const UsdPathSchema = z.string()
  .min(1, 'USD path cannot be empty')
  .regex(/^\/([A-Za-z_][A-Za-z0-9_]*(\/[A-Za-z_][A-Za-z0-9_]*)*)?$/, 'USD path must start with / and contain only valid prim names');
