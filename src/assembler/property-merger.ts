/**
 * Property Merger
 *
 * Layers compiled-in defaults, attribute-holder overrides and suffix tags
 * into one PropertySet. Later layers win; conflicts are not errors.
 */

import { USD_NODE_TYPES } from '../constants/usd';
import type { PropertyOverrides, PropertySet, SuffixTags } from '../types';

/**
 * Values used for every field nobody overrides
 */
export const DEFAULT_PROPERTIES: Readonly<PropertySet> = Object.freeze({
  geomType: 'Auto',
  kind: 'none',
  purpose: 'default',
  instanceable: false,
  hidden: false,
  active: true,
  payload: false,
  drawMode: 'default',
});

/**
 * How a node takes part in the tree; decides what `Auto` becomes
 */
export type NodeRole = 'fragment' | 'variantHolder' | 'group';

export function mergeProperties(
  overrides: PropertyOverrides | undefined,
  tags: Pick<SuffixTags, 'purposeOverride' | 'payloadOverride'>
): PropertySet {
  const merged: PropertySet = { ...DEFAULT_PROPERTIES };

  if (overrides) {
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  // Suffixes are visible in the file name, so they beat the attribute holder
  if (tags.purposeOverride !== undefined) {
    merged.purpose = tags.purposeOverride;
  }
  if (tags.payloadOverride !== undefined) {
    merged.payload = tags.payloadOverride;
  }

  return merged;
}

/**
 * Prim type for a node. `Auto` gives an Xform to anything that carries a
 * transform (fragment-backed nodes and variant holders) and a Scope to
 * pure grouping nodes.
 */
export function resolveGeomType(
  properties: Pick<PropertySet, 'geomType'>,
  role: NodeRole
): typeof USD_NODE_TYPES.XFORM | typeof USD_NODE_TYPES.SCOPE {
  switch (properties.geomType) {
    case 'Xform':
      return USD_NODE_TYPES.XFORM;
    case 'Scope':
      return USD_NODE_TYPES.SCOPE;
    case 'Auto':
      return role === 'group' ? USD_NODE_TYPES.SCOPE : USD_NODE_TYPES.XFORM;
  }
}
