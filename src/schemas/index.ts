/**
 * Zod Schemas for the Stage Assembler
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import {
  UpAxisSchema,
  GeomTypeSchema,
  KindSchema,
  PurposeSchema,
  DrawModeSchema,
  UsdIdentifierSchema,
  UsdPathSchema
} from './base-schemas';

/**
 * Stage time range, written to the layer header
 */
export const TimeCodesSchema = z.object({
  start: z.number(),
  end: z.number(),
  fps: z.number().positive().optional(),
}).refine(range => range.end >= range.start, {
  message: 'end must not be before start',
  path: ['end'],
});

/**
 * Stage Assembler Configuration Schema
 */
export const StageAssemblerConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  defaultPrim: z.string().optional().default(DEFAULT_CONFIG.DEFAULT_PRIM),
  stripRoot: z.boolean().optional().default(DEFAULT_CONFIG.STRIP_ROOT),
  nestMaterials: z.boolean().optional().default(DEFAULT_CONFIG.NEST_MATERIALS),
  variantSetName: UsdIdentifierSchema.optional().default(DEFAULT_CONFIG.VARIANT_SET_NAME),
  upAxis: UpAxisSchema.optional().default(DEFAULT_CONFIG.UP_AXIS),
  metersPerUnit: z.number().positive().optional().default(DEFAULT_CONFIG.METERS_PER_UNIT),
  relativePaths: z.boolean().optional().default(DEFAULT_CONFIG.RELATIVE_PATHS),
  outputFileName: z.string()
    .min(1, 'Output file name cannot be empty')
    .regex(/^[^/\\]+$/, 'Output file name must not contain directories')
    .optional(),
  timeCodes: TimeCodesSchema.optional(),
});

/**
 * Attribute-holder overrides; every field is optional
 */
export const PropertyOverridesSchema = z.object({
  geomType: GeomTypeSchema.optional(),
  kind: KindSchema.optional(),
  purpose: PurposeSchema.optional(),
  instanceable: z.boolean().optional(),
  hidden: z.boolean().optional(),
  active: z.boolean().optional(),
  payload: z.boolean().optional(),
  assetVersion: z.string().trim().min(1).optional(),
  drawMode: DrawModeSchema.optional(),
});

/**
 * Per-fragment sidecar written next to each export.
 * A sidecar without `file` declares a container that produced no export.
 */
export const FragmentSidecarSchema = z.object({
  objectName: z.string().min(1, 'Object name cannot be empty'),
  file: z.string().min(1, 'File path cannot be empty').optional(),
  parentPath: z.array(z.string().min(1, 'Ancestor name cannot be empty')).optional().default([]),
  properties: PropertyOverridesSchema.optional(),
});

/**
 * Type exports for TypeScript inference
 */
export type StageAssemblerConfig = z.infer<typeof StageAssemblerConfigSchema>;
export type StageAssemblerOptions = z.input<typeof StageAssemblerConfigSchema>;
export type TimeCodes = z.infer<typeof TimeCodesSchema>;
export type PropertyOverrides = z.infer<typeof PropertyOverridesSchema>;
export type FragmentSidecar = z.infer<typeof FragmentSidecarSchema>;
export type UpAxis = z.infer<typeof UpAxisSchema>;
export type GeomType = z.infer<typeof GeomTypeSchema>;
export type Kind = z.infer<typeof KindSchema>;
export type Purpose = z.infer<typeof PurposeSchema>;
export type DrawMode = z.infer<typeof DrawModeSchema>;
export type UsdPath = z.infer<typeof UsdPathSchema>;

// Re-export base schemas
export {
  UpAxisSchema,
  GeomTypeSchema,
  KindSchema,
  PurposeSchema,
  DrawModeSchema,
  UsdIdentifierSchema,
  UsdPathSchema
} from './base-schemas';
