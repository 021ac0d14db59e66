/**
 * Fragment Variants
 *
 * Exporters write alternatives of one object as `<name>_VARIANT<n>`
 * siblings inside a single fragment. Each group of two or more is folded
 * into a variant set on the parent, every variant holding the object
 * under its base name. Example:
 *
 *   Teapot_set/{Teapot_VARIANT1, Teapot_VARIANT2}
 *     -> Teapot_set { variantSet "modelVariant" = { "1" { def "Teapot" } ... } }
 */

import { DEFAULT_CONFIG } from '../constants/config';
import { USD_ARCS, USD_METADATA } from '../constants/usd';
import { compareSelectors, resolveSuffixes } from '../assembler/suffix-resolver';
import { makeValidPrimName } from '../utils/name-utils';
import { formatUsdString } from '../utils/usd-formatter';
import { remapJointTokens, remapPrimPaths } from './path-remapper';
import {
  INDENT,
  childPrims,
  primLines,
  type UsdaLine,
  type UsdaOutline,
  type UsdaPrim,
  type UsdaStatement
} from './usda-outline';

interface VariantChild {
  prim: UsdaPrim;
  selector: string;
}

function statement(texts: readonly string[]): UsdaStatement {
  return { kind: 'statement', lines: texts.map(text => ({ text, verbatim: false })) };
}

function firstLine(item: UsdaStatement): string {
  return item.lines[0]?.text ?? '';
}

/**
 * `_VARIANT` children of one prim grouped by the prim name they share
 */
function variantGroups(parent: UsdaPrim): Map<string, VariantChild[]> {
  const groups = new Map<string, VariantChild[]>();
  for (const prim of childPrims(parent)) {
    const tags = resolveSuffixes(prim.name);
    if (tags.variantMember === undefined) continue;
    const base = makeValidPrimName(tags.baseName);
    const group = groups.get(base) ?? [];
    group.push({ prim, selector: tags.variantMember });
    groups.set(base, group);
  }
  return groups;
}

/**
 * Groups that can be folded without clobbering anything already authored
 */
function canCollapse(parent: UsdaPrim, base: string, members: readonly VariantChild[]): boolean {
  if (members.length < 2) return false;
  if (new Set(members.map(member => member.selector)).size !== members.length) return false;
  if (childPrims(parent).some(prim => prim.name === base)) return false;
  return !parent.metadata.some(item =>
    firstLine(item).startsWith(`${USD_METADATA.VARIANTS} `) ||
    firstLine(item).startsWith(`${USD_ARCS.VARIANT_SETS} `)
  );
}

function variantSetStatement(setName: string, base: string, members: readonly VariantChild[]): UsdaStatement {
  const lines: UsdaLine[] = [{ text: `variantSet ${formatUsdString(setName)} = {`, verbatim: false }];
  for (const member of members) {
    lines.push({ text: `${INDENT}${formatUsdString(member.selector)} {`, verbatim: false });
    lines.push(...primLines({ ...member.prim, name: base }, 2));
    lines.push({ text: `${INDENT}}`, verbatim: false });
  }
  lines.push({ text: '}', verbatim: false });
  return { kind: 'statement', lines };
}

function collapseUnder(outline: UsdaOutline, parent: UsdaPrim, parentPath: string, setName: string): number {
  let collapsed = 0;

  for (const [base, group] of variantGroups(parent)) {
    if (!canCollapse(parent, base, group)) continue;

    const members = [...group].sort((a, b) => compareSelectors(a.selector, b.selector));
    const selection = members[0]?.selector;
    if (selection === undefined) continue;

    for (const member of members) {
      const plan = { fromPrefix: `${parentPath}/${member.prim.name}`, toPrefix: `${parentPath}/${base}`, materialScopes: [] };
      remapPrimPaths(outline.rootPrims, plan);
      remapJointTokens(outline.rootPrims, plan);
    }

    const removed = new Set(group.map(member => member.prim));
    const index = parent.body.findIndex(item => item.kind === 'prim' && removed.has(item));
    const body = parent.body.filter(item => item.kind !== 'prim' || !removed.has(item));
    body.splice(index, 0, variantSetStatement(setName, base, members));
    parent.body = body;

    parent.metadata.push(
      statement([
        `${USD_METADATA.VARIANTS} = {`,
        `${INDENT}string ${setName} = ${formatUsdString(selection)}`,
        '}',
      ]),
      statement([`${USD_ARCS.VARIANT_SETS} = ${formatUsdString(setName)}`])
    );
    collapsed++;
  }

  for (const child of childPrims(parent)) {
    collapsed += collapseUnder(outline, child, `${parentPath}/${child.name}`, setName);
  }
  return collapsed;
}

/**
 * Fold `_VARIANT` siblings into variant sets on their parents, selecting
 * the lowest selector. Prims at the layer root are never grouped. Returns
 * the number of variant sets written; a second run writes none.
 */
export function collapseVariantChildren(
  outline: UsdaOutline,
  variantSetName: string = DEFAULT_CONFIG.VARIANT_SET_NAME
): number {
  let collapsed = 0;
  for (const prim of outline.rootPrims) {
    collapsed += collapseUnder(outline, prim, `/${prim.name}`, variantSetName);
  }
  return collapsed;
}
