/**
 * Core Types for the Stage Assembler
 *
 * Records read from the export directory, the tree rebuilt from them,
 * and the warnings collected while assembling.
 */

import type {
  GeomType,
  Kind,
  Purpose,
  DrawMode,
  PropertyOverrides
} from './schemas';
import type { WARNING_KINDS } from './constants/errors';

/**
 * One exported fragment file and its hierarchy breadcrumbs
 */
export interface FragmentRecord {
  readonly filePath: string;
  readonly objectName: string;
  readonly parentPath: readonly string[];
  readonly propertyOverrides?: PropertyOverrides;
}

/**
 * A named ancestor (group, dummy) that produced no export of its own
 */
export interface ContainerRecord {
  readonly container: true;
  readonly objectName: string;
  readonly parentPath: readonly string[];
}

export type BatchRecord = FragmentRecord | ContainerRecord;

/**
 * Fully resolved configuration for one prim
 */
export interface PropertySet {
  geomType: GeomType;
  kind: Kind;
  purpose: Purpose;
  instanceable: boolean;
  hidden: boolean;
  active: boolean;
  payload: boolean;
  assetVersion?: string;
  drawMode: DrawMode;
}

/**
 * Roles encoded in an object name's trailing tokens
 */
export interface SuffixTags {
  baseName: string;
  variantGroup?: string;
  variantMember?: string;
  purposeOverride?: Exclude<Purpose, 'default'>;
  payloadOverride?: boolean;
  /** Tokens that looked like tags but could not be used as one */
  warnings: readonly AssemblyWarning[];
}

export interface VariantMember {
  selector: string;
  fragment: FragmentRecord;
  properties: PropertySet;
}

export interface VariantSetSpec {
  name: string;
  members: VariantMember[];
  defaultSelection: string;
}

/**
 * Assembler-internal tree node
 */
export interface HierarchyNode {
  name: string;
  /** Slash-joined names from the batch root, '' for the root itself */
  path: string;
  resolvedProperties: PropertySet;
  sourceFragment?: FragmentRecord;
  children: HierarchyNode[];
  variantSet?: VariantSetSpec;
}

export type WarningKind = typeof WARNING_KINDS[keyof typeof WARNING_KINDS];

/**
 * Recoverable condition reported with a successful result
 */
export interface AssemblyWarning {
  kind: WarningKind;
  /** Object name or file path the warning is about */
  subject: string;
  message: string;
}

export type {
  GeomType,
  Kind,
  Purpose,
  DrawMode,
  PropertyOverrides,
  StageAssemblerConfig,
  StageAssemblerOptions,
  TimeCodes,
  UpAxis
} from './schemas';
