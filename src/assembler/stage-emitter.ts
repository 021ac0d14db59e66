/**
 * Stage Emitter
 *
 * Turns the reconstructed tree into the composition document: one prim per
 * node under a single default prim, with reference or payload arcs into the
 * fragments and variant sets for collapsed siblings.
 */

import { DEFAULT_CONFIG } from '../constants/config';
import { WARNING_KINDS } from '../constants/errors';
import {
  USD_ARCS,
  USD_ATTRIBUTES,
  USD_DEFAULT_NAMES,
  USD_METADATA,
  USD_NODE_TYPES,
  USD_TOKENS
} from '../constants/usd';
import { UsdAssetPath, UsdNode, UsdSpec } from '../core/usd-node';
import type {
  AssemblyWarning,
  FragmentRecord,
  HierarchyNode,
  PropertySet,
  TimeCodes,
  UpAxis
} from '../types';
import { makeValidPrimName, toAssetPath } from '../utils/name-utils';
import { resolveGeomType, type NodeRole } from './property-merger';

export interface EmitOptions {
  /** Directory the document is written to; relative arcs resolve against it */
  documentDir: string;
  defaultPrim?: string;
  relativePaths?: boolean;
  upAxis?: UpAxis;
  metersPerUnit?: number;
  timeCodes?: TimeCodes;
}

export interface EmittedStage {
  stage: UsdNode;
  document: string;
  warnings: AssemblyWarning[];
  primCount: number;
}

/**
 * Default prim name, falling back to `World` when blank
 */
export function resolveDefaultPrimName(name: string | undefined): string {
  const trimmed = name?.trim() ?? '';
  return trimmed.length > 0 ? makeValidPrimName(trimmed) : USD_DEFAULT_NAMES.DEFAULT_PRIM;
}

function roleOf(node: HierarchyNode): NodeRole {
  if (node.sourceFragment) return 'fragment';
  if (node.variantSet) return 'variantHolder';
  return 'group';
}

export function emitStage(tree: HierarchyNode, options: EmitOptions): EmittedStage {
  const warnings: AssemblyWarning[] = [];
  const relativePaths = options.relativePaths ?? DEFAULT_CONFIG.RELATIVE_PATHS;
  const defaultPrim = resolveDefaultPrimName(options.defaultPrim);

  const stage = new UsdNode(`/${defaultPrim}`, USD_NODE_TYPES.XFORM);
  stage.setMetadata(USD_METADATA.KIND, USD_TOKENS.ASSEMBLY);
  stage
    .setLayerMetadata(USD_METADATA.DEFAULT_PRIM, defaultPrim)
    .setLayerMetadata('metersPerUnit', options.metersPerUnit ?? DEFAULT_CONFIG.METERS_PER_UNIT)
    .setLayerMetadata('upAxis', options.upAxis ?? DEFAULT_CONFIG.UP_AXIS);

  const timeCodes = options.timeCodes;
  if (timeCodes) {
    if (timeCodes.fps !== undefined) {
      stage
        .setLayerMetadata('timeCodesPerSecond', timeCodes.fps)
        .setLayerMetadata('framesPerSecond', timeCodes.fps);
    }
    stage
      .setLayerMetadata('startTimeCode', timeCodes.start)
      .setLayerMetadata('endTimeCode', timeCodes.end);
  }

  const addArc = (spec: UsdSpec, fragment: FragmentRecord, properties: PropertySet): void => {
    const assetPath = toAssetPath(fragment.filePath, options.documentDir, relativePaths);
    spec.setMetadata(properties.payload ? USD_ARCS.PAYLOAD : USD_ARCS.REFERENCES, new UsdAssetPath(assetPath));
  };

  /**
   * Authors every non-default field. Metadata goes first so arcs added
   * afterwards land below it.
   */
  const applyProperties = (spec: UsdSpec, node: HierarchyNode, properties: PropertySet): void => {
    if (!properties.active) {
      spec.setMetadata(USD_METADATA.ACTIVE, false);
    }
    if (properties.assetVersion !== undefined) {
      spec.setMetadata(USD_METADATA.ASSET_INFO, { [USD_METADATA.ASSET_VERSION]: properties.assetVersion });
    }
    if (properties.instanceable) {
      if (node.children.length > 0) {
        warnings.push({
          kind: WARNING_KINDS.INSTANCEABLE_WITH_CHILDREN,
          subject: node.path,
          message: `'${node.path}' has child prims; instanceable was not authored`,
        });
      } else {
        spec.setMetadata(USD_METADATA.INSTANCEABLE, true);
      }
    }
    if (properties.kind !== 'none') {
      spec.setMetadata(USD_METADATA.KIND, properties.kind);
    }
    if (properties.drawMode !== 'default') {
      spec.setMetadata(USD_ARCS.API_SCHEMAS, [USD_TOKENS.GEOM_MODEL_API]);
    }

    if (properties.purpose !== 'default') {
      spec.setAttribute(USD_ATTRIBUTES.PURPOSE, properties.purpose);
    }
    if (properties.hidden) {
      spec.setAttribute(USD_ATTRIBUTES.VISIBILITY, USD_TOKENS.INVISIBLE);
    }
    if (properties.drawMode !== 'default') {
      spec.setAttribute(USD_ATTRIBUTES.DRAW_MODE, properties.drawMode);
    }
  };

  const emitNode = (parent: UsdNode, node: HierarchyNode): void => {
    const prim = parent.createChild(node.name, resolveGeomType(node.resolvedProperties, roleOf(node)));
    applyProperties(prim, node, node.resolvedProperties);

    if (node.sourceFragment) {
      addArc(prim, node.sourceFragment, node.resolvedProperties);
    }

    const variantSet = node.variantSet;
    if (variantSet) {
      prim
        .setMetadata(USD_METADATA.VARIANTS, { [variantSet.name]: variantSet.defaultSelection })
        .setMetadata(USD_ARCS.VARIANT_SETS, variantSet.name);

      const usdVariantSet = prim.variantSet(variantSet.name);
      for (const member of variantSet.members) {
        const variant = usdVariantSet.variant(member.selector);
        applyProperties(variant, node, member.properties);
        addArc(variant, member.fragment, member.properties);
      }
    }

    for (const child of node.children) {
      emitNode(prim, child);
    }
  };

  for (const child of tree.children) {
    emitNode(stage, child);
  }

  return {
    stage,
    document: stage.serializeToUsda(),
    warnings,
    primCount: stage.countPrims(),
  };
}
