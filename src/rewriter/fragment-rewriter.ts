/**
 * Fragment Rewriter
 *
 * Removes the `/root` wrapper the native exporter puts around every
 * fragment, nests material scopes under the content prim and remaps the
 * paths and joint tokens that pointed through the old locations. Variant
 * siblings inside the fragment are then folded into a variant set. A
 * fragment whose shape is not the expected one is left untouched and
 * reported.
 */

import * as fs from 'fs';
import { DEFAULT_CONFIG, FILE_EXTENSIONS, LAYER_MAGIC } from '../constants/config';
import { WARNING_KINDS } from '../constants/errors';
import { EXPORTER_SHAPES, USD_NODE_TYPES } from '../constants/usd';
import { UsdErrorFactory, UsdaSyntaxError } from '../errors';
import type { AssemblyWarning } from '../types';
import { writeFileAtomic } from '../utils/file-utils';
import { Logger, LoggerFactory } from '../utils/logger';
import { collapseVariantChildren } from './fragment-variants';
import { collectPrimPaths, remapJointTokens, remapPrimPaths, type RemapPlan } from './path-remapper';
import {
  childPrims,
  getLayerDefaultPrim,
  parseUsdaOutline,
  serializeUsdaOutline,
  setLayerDefaultPrim,
  type UsdaBodyItem,
  type UsdaOutline,
  type UsdaPrim
} from './usda-outline';

export interface RewriteOptions {
  stripRoot?: boolean;
  nestMaterials?: boolean;
  /** Variant set written for `_VARIANT` siblings inside a fragment */
  variantSetName?: string;
  logger?: Logger;
}

export interface RewriteResult {
  text: string;
  changed: boolean;
  warnings: AssemblyWarning[];
  /** defaultPrim of the rewritten layer, when one was set */
  defaultPrim?: string;
}

export interface FileRewriteResult extends Omit<RewriteResult, 'text'> {
  filePath: string;
}

const SKELETON_TYPE = 'Skeleton';
const BONES_SCOPE = 'Bones';
const SCENE_WRAPPER = /^scene($|_)/i;

/**
 * Thrown inside a rewrite to abandon it; becomes a WrapperShapeMismatch
 */
class ShapeMismatch extends Error {}

function isMaterialScope(prim: UsdaPrim): boolean {
  return EXPORTER_SHAPES.MATERIAL_SCOPE_NAMES.includes(prim.name);
}

function isContent(prim: UsdaPrim): boolean {
  return prim.specifier !== 'class' && !prim.name.startsWith(EXPORTER_SHAPES.CLASS_PREFIX);
}

function withoutPrims(body: UsdaBodyItem[], removed: readonly UsdaPrim[]): UsdaBodyItem[] {
  return body.filter(item => item.kind !== 'prim' || !removed.includes(item));
}

function assertNoCollision(existing: readonly UsdaPrim[], incoming: readonly UsdaPrim[], where: string): void {
  const taken = new Set(existing.map(prim => prim.name));
  for (const prim of incoming) {
    if (taken.has(prim.name)) {
      throw new ShapeMismatch(`moving '${prim.name}' to ${where} would replace an existing prim`);
    }
    taken.add(prim.name);
  }
}

/**
 * Follows directly nested `root` wrappers down to the one holding content
 */
function innermostWrapper(wrapper: UsdaPrim): { prim: UsdaPrim; path: string } {
  let prim = wrapper;
  let path = `/${wrapper.name}`;
  for (;;) {
    const children = childPrims(prim);
    const only = children.length === 1 ? children[0] : undefined;
    if (!only || only.name !== EXPORTER_SHAPES.WRAPPER_NAME) {
      return { prim, path };
    }
    prim = only;
    path = `${path}/${only.name}`;
  }
}

/**
 * Skeletal exports keep `/root` as the SkelRoot. Nested wrappers and a
 * `Scene_*` wrapper around the character are flattened into it.
 */
function rewriteSkelRoot(outline: UsdaOutline, wrapper: UsdaPrim): boolean {
  let modified = false;
  const rootPath = `/${wrapper.name}`;

  const inner = innermostWrapper(wrapper);
  if (inner.prim !== wrapper) {
    const moved = childPrims(inner.prim);
    const nested = childPrims(wrapper);
    wrapper.body = [...withoutPrims(wrapper.body, nested), ...moved];
    remapPrimPaths(outline.rootPrims, { fromPrefix: inner.path, toPrefix: rootPath, materialScopes: [] });
    modified = true;
  }

  const children = childPrims(wrapper);
  const hasSkeleton = children.some(child => child.name === BONES_SCOPE || child.typeName === SKELETON_TYPE);
  const candidates = children.filter(child =>
    !isMaterialScope(child) &&
    child.name !== BONES_SCOPE &&
    child.name !== EXPORTER_SHAPES.WRAPPER_NAME &&
    child.typeName !== SKELETON_TYPE &&
    isContent(child)
  );

  const scene = candidates.length === 1 ? candidates[0] : undefined;
  if (hasSkeleton && scene && SCENE_WRAPPER.test(scene.name) && childPrims(scene).length > 0) {
    const moved = childPrims(scene);
    const remaining = children.filter(child => child !== scene);
    assertNoCollision(remaining, moved, rootPath);
    wrapper.body = [...withoutPrims(wrapper.body, [scene]), ...moved];
    const plan: RemapPlan = {
      fromPrefix: `${rootPath}/${scene.name}`,
      toPrefix: rootPath,
      materialScopes: [],
    };
    remapPrimPaths(outline.rootPrims, plan);
    remapJointTokens(outline.rootPrims, plan, { relativePrefix: scene.name });
    modified = true;
  }

  return setLayerDefaultPrim(outline, wrapper.name) || modified;
}

/**
 * Rewrites one fragment's text. Running it on its own output changes nothing.
 */
export function rewriteFragmentText(
  text: string,
  options: RewriteOptions = {},
  subject: string = 'fragment'
): RewriteResult {
  const stripRoot = options.stripRoot ?? DEFAULT_CONFIG.STRIP_ROOT;
  const nestMaterials = options.nestMaterials ?? DEFAULT_CONFIG.NEST_MATERIALS;
  const variantSetName = options.variantSetName ?? DEFAULT_CONFIG.VARIANT_SET_NAME;

  const mismatch = (reason: string): RewriteResult => ({
    text,
    changed: false,
    warnings: [{
      kind: WARNING_KINDS.WRAPPER_SHAPE_MISMATCH,
      subject,
      message: `Left unchanged: ${reason}`,
    }],
  });

  let outline: UsdaOutline;
  try {
    outline = parseUsdaOutline(text);
  } catch (error) {
    if (error instanceof UsdaSyntaxError) {
      return mismatch(error.message);
    }
    throw error;
  }

  const finish = (modified: boolean, defaultPrim: string): RewriteResult => {
    const collapsed = collapseVariantChildren(outline, variantSetName) > 0;
    if (!modified && !collapsed) {
      return { text, changed: false, warnings: [], defaultPrim };
    }
    return { text: serializeUsdaOutline(outline), changed: true, warnings: [], defaultPrim };
  };

  const currentDefault = getLayerDefaultPrim(outline);
  const wrapper = outline.rootPrims.find(prim => prim.name === EXPORTER_SHAPES.WRAPPER_NAME);

  if (!wrapper) {
    // Already rewritten: the wrapper is gone and defaultPrim names a root prim
    if (currentDefault !== undefined && outline.rootPrims.some(prim => prim.name === currentDefault)) {
      return finish(false, currentDefault);
    }
    return mismatch(`no /${EXPORTER_SHAPES.WRAPPER_NAME} wrapper`);
  }

  let modified: boolean;
  let defaultPrim: string;

  try {
    if (wrapper.typeName === USD_NODE_TYPES.SKEL_ROOT) {
      modified = rewriteSkelRoot(outline, wrapper);
      defaultPrim = wrapper.name;
    } else {
      const inner = innermostWrapper(wrapper);
      const children = childPrims(inner.prim);
      if (children.length === 0) {
        return mismatch('the wrapper is empty');
      }

      const materials = children.filter(isMaterialScope);
      const main = children.filter(child => !isMaterialScope(child));
      const content = main.filter(isContent);
      const first = content[0] ?? main[0];
      if (!first) {
        return mismatch('the wrapper holds only material scopes');
      }

      const nest = nestMaterials && content.length === 1 && materials.length > 0;
      if (nest) {
        assertNoCollision(childPrims(first), materials, `/${first.name}`);
      }

      if (stripRoot) {
        const others = outline.rootPrims.filter(prim => prim !== wrapper);
        assertNoCollision(others, nest ? main : children, 'the layer root');

        const index = outline.rootPrims.indexOf(wrapper);
        const lifted = nest ? main : [...main, ...materials];
        outline.rootPrims.splice(index, 1, ...lifted);
        if (nest) {
          first.body = [...first.body, ...materials];
        }

        const plan: RemapPlan = {
          fromPrefix: inner.path,
          toPrefix: '',
          materialScopes: materials.map(prim => prim.name),
          ...(nest ? { materialTarget: `/${first.name}` } : {}),
        };
        remapPrimPaths(outline.rootPrims, plan);
        remapJointTokens(outline.rootPrims, plan, {
          contentRoot: first.name,
          primPaths: collectPrimPaths(outline.rootPrims),
        });
        setLayerDefaultPrim(outline, first.name);
        defaultPrim = first.name;
        modified = true;
      } else {
        modified = false;
        if (nest) {
          inner.prim.body = withoutPrims(inner.prim.body, materials);
          first.body = [...first.body, ...materials];
          remapPrimPaths(outline.rootPrims, {
            fromPrefix: inner.path,
            toPrefix: inner.path,
            materialScopes: materials.map(prim => prim.name),
            materialTarget: `${inner.path}/${first.name}`,
          });
          modified = true;
        }
        modified = setLayerDefaultPrim(outline, wrapper.name) || modified;
        defaultPrim = wrapper.name;
      }
    }
  } catch (error) {
    if (error instanceof ShapeMismatch) {
      return mismatch(error.message);
    }
    throw error;
  }

  return finish(modified, defaultPrim);
}

/**
 * Rewrites a fragment file in place. Binary crate layers and `.usdc`
 * files are reported and left alone.
 */
export async function rewriteFragmentFile(
  filePath: string,
  options: RewriteOptions = {}
): Promise<FileRewriteResult> {
  const logger = options.logger ?? LoggerFactory.forRewriter();

  let buffer: Buffer;
  try {
    buffer = await fs.promises.readFile(filePath);
  } catch (error) {
    throw UsdErrorFactory.fileSystemError(
      `Could not read fragment: ${filePath}`,
      filePath,
      'read',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }

  const isCrate = buffer.subarray(0, LAYER_MAGIC.USDC.length).toString('latin1') === LAYER_MAGIC.USDC;
  if (isCrate || filePath.endsWith(FILE_EXTENSIONS.USDC)) {
    logger.warn('Skipping binary fragment', { filePath });
    return {
      filePath,
      changed: false,
      warnings: [{
        kind: WARNING_KINDS.UNSUPPORTED_FRAGMENT_FORMAT,
        subject: filePath,
        message: 'Binary crate layers cannot be rewritten; export fragments as text',
      }],
    };
  }

  const result = rewriteFragmentText(buffer.toString('utf8'), options, filePath);
  for (const warning of result.warnings) {
    logger.warn(warning.message, { filePath, kind: warning.kind });
  }

  if (result.changed) {
    await writeFileAtomic(filePath, result.text);
    logger.logFileOperation('rewrite', filePath, Buffer.byteLength(result.text), {
      defaultPrim: result.defaultPrim,
    });
  } else {
    logger.debug('Fragment already in shape', { filePath });
  }

  return {
    filePath,
    changed: result.changed,
    warnings: result.warnings,
    ...(result.defaultPrim !== undefined ? { defaultPrim: result.defaultPrim } : {}),
  };
}
