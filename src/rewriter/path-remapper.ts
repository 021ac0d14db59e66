/**
 * Path Remapper
 *
 * Rewrites SdfPath literals (`<...>`) after prims have moved. Used for
 * relationship targets, attribute connections, inherits, specializes and
 * internal references. Skeleton joint tokens hold prim paths as strings
 * and are remapped separately.
 */

import { childPrims, type UsdaPrim, type UsdaStatement } from './usda-outline';

/**
 * Where the moved prims used to live and where they are now
 */
export interface RemapPlan {
  /** Absolute path of the wrapper whose children moved */
  fromPrefix: string;
  /** New parent of those children; '' for the layer root */
  toPrefix: string;
  /** Absolute path of the prim material scopes were nested under */
  materialTarget?: string;
  materialScopes: readonly string[];
}

/**
 * Splits `path` against `prefix` on a path boundary and returns the
 * remainder ('' for an exact match), or undefined when it does not match
 */
function stripPathPrefix(path: string, prefix: string): string | undefined {
  if (path === prefix) return '';
  if (!path.startsWith(prefix)) return undefined;
  const boundary = path[prefix.length];
  if (boundary === '/' || boundary === '.' || boundary === '{' || boundary === '[') {
    return path.slice(prefix.length);
  }
  return undefined;
}

/**
 * New location of an absolute path, or undefined when it does not move.
 * Relative paths are left alone.
 */
export function remapSdfPath(path: string, plan: RemapPlan): string | undefined {
  if (!path.startsWith('/')) {
    return undefined;
  }

  if (plan.materialTarget !== undefined) {
    for (const scope of plan.materialScopes) {
      const rest = stripPathPrefix(path, `${plan.fromPrefix}/${scope}`);
      if (rest !== undefined) {
        return `${plan.materialTarget}/${scope}${rest}`;
      }
    }
  }

  const rest = stripPathPrefix(path, plan.fromPrefix);
  if (rest === undefined) {
    return undefined;
  }
  if (rest.startsWith('/')) {
    const remapped = plan.toPrefix + rest;
    return remapped === path ? undefined : remapped;
  }
  // The wrapper itself (or one of its properties)
  if (plan.toPrefix.length === 0) {
    return rest.length === 0 ? '/' : undefined;
  }
  const remapped = plan.toPrefix + rest;
  return remapped === path ? undefined : remapped;
}

/**
 * Applies `remap` to every `<...>` literal outside strings, asset paths
 * and comments. A literal right after an asset path names a prim in that
 * other layer and is left as is.
 */
export function remapPathLiterals(text: string, remap: (path: string) => string | undefined): string {
  let result = '';
  let i = 0;
  let afterAsset = false;

  while (i < text.length) {
    const ch = text[i] ?? '';

    if (ch === '"' || ch === "'") {
      const triple = text.startsWith(ch.repeat(3), i);
      const delimiter = triple ? ch.repeat(3) : ch;
      let end = i + delimiter.length;
      while (end < text.length && !text.startsWith(delimiter, end)) {
        end += !triple && text[end] === '\\' ? 2 : 1;
      }
      end = Math.min(end + delimiter.length, text.length);
      result += text.slice(i, end);
      i = end;
      afterAsset = false;
      continue;
    }

    if (ch === '@') {
      const delimiter = text.startsWith('@@@', i) ? '@@@' : '@';
      const close = text.indexOf(delimiter, i + delimiter.length);
      const end = close === -1 ? text.length : close + delimiter.length;
      result += text.slice(i, end);
      i = end;
      afterAsset = true;
      continue;
    }

    if (ch === '#') {
      const newline = text.indexOf('\n', i);
      const end = newline === -1 ? text.length : newline;
      result += text.slice(i, end);
      i = end;
      continue;
    }

    if (ch === '<') {
      const close = text.indexOf('>', i + 1);
      if (close !== -1) {
        const literal = text.slice(i + 1, close);
        const remapped = afterAsset ? undefined : remap(literal);
        result += `<${remapped ?? literal}>`;
        i = close + 1;
        afterAsset = false;
        continue;
      }
    }

    if (ch !== ' ' && ch !== '\t') {
      afterAsset = false;
    }
    result += ch;
    i++;
  }

  return result;
}

/**
 * Replace the text of one statement in place; returns whether anything
 * changed
 */
function rewriteStatement(statement: UsdaStatement, rewrite: (text: string) => string): boolean {
  const original = statement.lines.map(line => line.text).join('\n');
  const rewritten = rewrite(original);
  if (rewritten === original) {
    return false;
  }
  const texts = rewritten.split('\n');
  statement.lines = statement.lines.map((line, index) => ({ ...line, text: texts[index] ?? line.text }));
  return true;
}

function remapStatement(statement: UsdaStatement, plan: RemapPlan): boolean {
  return rewriteStatement(statement, text => remapPathLiterals(text, path => remapSdfPath(path, plan)));
}

/**
 * Remap every path literal in the given prims and their descendants.
 * Returns the number of statements that changed.
 */
export function remapPrimPaths(prims: readonly UsdaPrim[], plan: RemapPlan): number {
  let changed = 0;
  for (const prim of prims) {
    for (const item of prim.metadata) {
      if (remapStatement(item, plan)) changed++;
    }
    for (const item of prim.body) {
      if (item.kind === 'statement' && remapStatement(item, plan)) changed++;
    }
    changed += remapPrimPaths(childPrims(prim), plan);
  }
  return changed;
}

const JOINTS_DECLARATION = /^(?:uniform\s+)?token\[\]\s+(?:skel:)?joints\s*=/;

export interface JointRemapOptions {
  /** Wrapper name stripped from the front of relative tokens */
  relativePrefix?: string;
  /** Root prim tried in front of a token that names no prim */
  contentRoot?: string;
  /** Absolute paths of every prim in the layer */
  primPaths?: ReadonlySet<string>;
}

function formatJointToken(path: string, absolute: boolean): string {
  return absolute ? path : path.replace(/^\/+/, '');
}

/**
 * New value of one skeleton joint token. Joint tokens are prim paths
 * written as plain strings, absolute or relative; the result keeps the
 * style of the input.
 */
export function remapJointToken(token: string, plan: RemapPlan, options: JointRemapOptions = {}): string {
  if (token.length === 0) {
    return token;
  }
  const absolute = token.startsWith('/');

  let remapped = absolute ? remapSdfPath(token, plan) : remapSdfPath(`/${token}`, plan);
  const prefix = options.relativePrefix?.replace(/^\/+|\/+$/g, '');
  if (remapped === undefined && !absolute && prefix && token.startsWith(`${prefix}/`)) {
    remapped = token.slice(prefix.length + 1);
  }
  if (remapped !== undefined) {
    return formatJointToken(remapped, absolute);
  }

  const { contentRoot, primPaths } = options;
  if (contentRoot === undefined || primPaths === undefined) {
    return token;
  }
  const tokenPath = absolute ? token : `/${token}`;
  if (primPaths.has(tokenPath)) {
    return token;
  }
  const prefixed = `/${contentRoot}${tokenPath}`;
  return primPaths.has(prefixed) ? formatJointToken(prefixed, absolute) : token;
}

/**
 * Applies `remap` to the contents of every quoted string outside comments
 */
function remapQuotedTokens(text: string, remap: (token: string) => string): string {
  let result = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i] ?? '';

    if (ch === '#') {
      const newline = text.indexOf('\n', i);
      const end = newline === -1 ? text.length : newline;
      result += text.slice(i, end);
      i = end;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let end = i + 1;
      while (end < text.length && text[end] !== ch && text[end] !== '\n') {
        end += text[end] === '\\' ? 2 : 1;
      }
      if (text[end] === ch) {
        result += `${ch}${remap(text.slice(i + 1, end))}${ch}`;
        i = end + 1;
        continue;
      }
    }

    result += ch;
    i++;
  }

  return result;
}

/**
 * Remap the tokens of `joints` and `skel:joints` arrays in the given prims
 * and their descendants. Returns the number of statements that changed.
 */
export function remapJointTokens(
  prims: readonly UsdaPrim[],
  plan: RemapPlan,
  options: JointRemapOptions = {}
): number {
  let changed = 0;
  for (const prim of prims) {
    for (const item of prim.body) {
      if (item.kind !== 'statement' || !JOINTS_DECLARATION.test(item.lines[0]?.text ?? '')) {
        continue;
      }
      if (rewriteStatement(item, text => remapQuotedTokens(text, token => remapJointToken(token, plan, options)))) {
        changed++;
      }
    }
    changed += remapJointTokens(childPrims(prim), plan, options);
  }
  return changed;
}

/**
 * Absolute paths of the given prims and all their descendants
 */
export function collectPrimPaths(prims: readonly UsdaPrim[], parentPath: string = ''): Set<string> {
  const paths = new Set<string>();
  for (const prim of prims) {
    const path = `${parentPath}/${prim.name}`;
    paths.add(path);
    for (const descendant of collectPrimPaths(childPrims(prim), path)) {
      paths.add(descendant);
    }
  }
  return paths;
}
