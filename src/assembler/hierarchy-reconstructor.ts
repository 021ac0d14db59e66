/**
 * Hierarchy Reconstructor
 *
 * Rebuilds the scene tree from flat batch records. Nodes live in an arena
 * keyed by the slash-joined path of their prim names, so a record's
 * ancestors are found by prefix and never by insertion side effects.
 */

import { USD_DEFAULT_NAMES } from '../constants/usd';
import { UsdErrorFactory } from '../errors';
import type {
  AssemblyWarning,
  BatchRecord,
  ContainerRecord,
  FragmentRecord,
  HierarchyNode,
  VariantMember
} from '../types';
import { makeValidPrimName } from '../utils/name-utils';
import { compareSelectors, resolveSuffixes } from './suffix-resolver';
import { DEFAULT_PROPERTIES, mergeProperties } from './property-merger';

export interface ReconstructOptions {
  variantSetName?: string;
}

export interface ReconstructedHierarchy {
  root: HierarchyNode;
  warnings: AssemblyWarning[];
}

/**
 * Who has claimed an arena slot. A slot without owners is a placeholder
 * created for an ancestor whose own record has not been seen yet.
 */
interface ArenaSlot {
  node: HierarchyNode;
  fragmentOwner?: string;
  containerOwner?: string;
  variantOwners: Map<string, string>;
}

const PATH_SEPARATOR = '/';

export function isContainerRecord(record: BatchRecord): record is ContainerRecord {
  return 'container' in record && record.container;
}

export function isFragmentRecord(record: BatchRecord): record is FragmentRecord {
  return !isContainerRecord(record);
}

/**
 * Prim name an object or ancestor name resolves to
 */
function nodeNameFor(objectName: string): string {
  return makeValidPrimName(resolveSuffixes(objectName).baseName);
}

function keyFor(names: readonly string[]): string {
  return names.join(PATH_SEPARATOR);
}

function createNode(name: string, path: string): HierarchyNode {
  return {
    name,
    path,
    resolvedProperties: { ...DEFAULT_PROPERTIES },
    children: [],
  };
}

function primPathOf(key: string): string {
  return PATH_SEPARATOR + key;
}

/**
 * Rebuilds the tree for one batch.
 *
 * Throws `IncompleteHierarchyError` when an ancestor name is carried by no
 * record, `NestedVariantError` when a variant member sits under a member of
 * its own group, and `AmbiguousSiblingError` when two siblings resolve to
 * the same prim with nothing to tell them apart.
 */
export function reconstructHierarchy(
  records: readonly BatchRecord[],
  options: ReconstructOptions = {}
): ReconstructedHierarchy {
  const variantSetName = options.variantSetName ?? USD_DEFAULT_NAMES.VARIANT_SET;
  const warnings: AssemblyWarning[] = [];
  const root = createNode('', '');
  const rootSlot: ArenaSlot = { node: root, variantOwners: new Map() };
  const arena = new Map<string, ArenaSlot>([['', rootSlot]]);

  // Object names claiming each path; an ancestor must be one of them verbatim
  const declared = new Map<string, Set<string>>();
  for (const record of records) {
    const key = keyFor([...record.parentPath.map(nodeNameFor), nodeNameFor(record.objectName)]);
    const names = declared.get(key) ?? new Set<string>();
    names.add(record.objectName);
    declared.set(key, names);
  }

  const slotAt = (names: readonly string[], parent: ArenaSlot): ArenaSlot => {
    const key = keyFor(names);
    let slot = arena.get(key);
    if (!slot) {
      const name = names[names.length - 1] ?? '';
      slot = { node: createNode(name, key), variantOwners: new Map() };
      arena.set(key, slot);
      parent.node.children.push(slot.node);
    }
    return slot;
  };

  const rejectIfClaimed = (slot: ArenaSlot, objectName: string): void => {
    const owner = slot.fragmentOwner ?? slot.containerOwner;
    if (owner !== undefined) {
      throw UsdErrorFactory.ambiguousSibling(primPathOf(slot.node.path), [owner, objectName]);
    }
  };

  const addVariantMember = (slot: ArenaSlot, member: VariantMember, objectName: string): void => {
    const existing = slot.variantOwners.get(member.selector);
    if (existing !== undefined) {
      throw UsdErrorFactory.ambiguousSibling(primPathOf(slot.node.path), [existing, objectName]);
    }
    slot.variantOwners.set(member.selector, objectName);
    if (!slot.node.variantSet) {
      slot.node.variantSet = { name: variantSetName, members: [], defaultSelection: member.selector };
    }
    slot.node.variantSet.members.push(member);
  };

  const attachFragment = (slot: ArenaSlot, record: FragmentRecord): void => {
    const tags = resolveSuffixes(record.objectName);
    const properties = mergeProperties(record.propertyOverrides, tags);

    if (tags.variantMember !== undefined) {
      if (slot.containerOwner !== undefined) {
        throw UsdErrorFactory.ambiguousSibling(primPathOf(slot.node.path), [slot.containerOwner, record.objectName]);
      }
      // A plain sibling seen earlier becomes the default alternative
      if (slot.fragmentOwner !== undefined && slot.node.sourceFragment) {
        addVariantMember(slot, {
          selector: USD_DEFAULT_NAMES.DEFAULT_VARIANT,
          fragment: slot.node.sourceFragment,
          properties: slot.node.resolvedProperties,
        }, slot.fragmentOwner);
        delete slot.node.sourceFragment;
        slot.node.resolvedProperties = { ...DEFAULT_PROPERTIES };
        delete slot.fragmentOwner;
      }
      addVariantMember(slot, { selector: tags.variantMember, fragment: record, properties }, record.objectName);
      return;
    }

    rejectIfClaimed(slot, record.objectName);
    if (slot.variantOwners.size > 0) {
      addVariantMember(slot, {
        selector: USD_DEFAULT_NAMES.DEFAULT_VARIANT,
        fragment: record,
        properties,
      }, record.objectName);
      return;
    }

    slot.fragmentOwner = record.objectName;
    slot.node.sourceFragment = record;
    slot.node.resolvedProperties = properties;
  };

  const attachContainer = (slot: ArenaSlot, record: ContainerRecord): void => {
    // A variant-tagged group only declares the holder its members share
    if (resolveSuffixes(record.objectName).variantMember !== undefined) {
      return;
    }
    rejectIfClaimed(slot, record.objectName);
    const member = slot.variantOwners.values().next();
    if (!member.done) {
      throw UsdErrorFactory.ambiguousSibling(primPathOf(slot.node.path), [member.value, record.objectName]);
    }
    slot.containerOwner = record.objectName;
  };

  for (const record of records) {
    warnings.push(...resolveSuffixes(record.objectName).warnings);
    rejectNestedVariant(record);

    const names: string[] = [];
    let parent = rootSlot;

    for (const ancestor of record.parentPath) {
      names.push(nodeNameFor(ancestor));
      if (!declared.get(keyFor(names))?.has(ancestor)) {
        throw UsdErrorFactory.incompleteHierarchy(record.objectName, ancestor, record.parentPath);
      }
      parent = slotAt(names, parent);
    }

    names.push(nodeNameFor(record.objectName));
    const slot = slotAt(names, parent);

    if (isContainerRecord(record)) {
      attachContainer(slot, record);
    } else {
      attachFragment(slot, record);
    }
  }

  for (const slot of arena.values()) {
    const variantSet = slot.node.variantSet;
    if (variantSet) {
      variantSet.members.sort((a, b) => compareMembers(a.selector, b.selector));
      variantSet.defaultSelection = variantSet.members[0]?.selector ?? variantSet.defaultSelection;
    }
  }

  return { root, warnings };
}

/**
 * A variant member cannot sit under a member of its own variant group
 */
function rejectNestedVariant(record: BatchRecord): void {
  const tags = resolveSuffixes(record.objectName);
  const ancestor = record.parentPath[record.parentPath.length - 1];
  if (tags.variantMember === undefined || ancestor === undefined) {
    return;
  }
  const ancestorTags = resolveSuffixes(ancestor);
  if (
    ancestorTags.variantMember !== undefined &&
    makeValidPrimName(ancestorTags.baseName) === makeValidPrimName(tags.baseName)
  ) {
    throw UsdErrorFactory.nestedVariant(record.objectName, ancestor, record.parentPath);
  }
}

/**
 * `default` first, then selectors by numeric value
 */
function compareMembers(a: string, b: string): number {
  const defaultName = USD_DEFAULT_NAMES.DEFAULT_VARIANT;
  if (a === defaultName || b === defaultName) {
    return a === b ? 0 : a === defaultName ? -1 : 1;
  }
  return compareSelectors(a, b);
}

/**
 * Number of fragments the tree accounts for, variant members included
 */
export function countFragments(node: HierarchyNode): number {
  let count = node.sourceFragment ? 1 : 0;
  count += node.variantSet?.members.length ?? 0;
  for (const child of node.children) {
    count += countFragments(child);
  }
  return count;
}
