/**
 * Suffix Resolver
 *
 * Reads the trailing `_TOKEN`s of an object name: `VARIANT<digits>`,
 * `RENDER`, `PROXY`, `GUIDE` and `PAYLOAD`, in any order.
 *
 * Example: "Chair_RENDER_VARIANT1" -> base "Chair", member "1", purpose render
 */

import { WARNING_KINDS } from '../constants/errors';
import type { AssemblyWarning, Purpose, SuffixTags } from '../types';

const TAG_DELIMITER = '_';
const VARIANT_PREFIX = 'VARIANT';
const VARIANT_TOKEN = /^VARIANT([0-9]+)$/;
const PAYLOAD_TOKEN = 'PAYLOAD';

const PURPOSE_TOKENS: Readonly<Record<string, Exclude<Purpose, 'default'>>> = {
  RENDER: 'render',
  PROXY: 'proxy',
  GUIDE: 'guide',
};

type SuffixToken =
  | { slot: 'variant'; member: string }
  | { slot: 'purpose'; purpose: Exclude<Purpose, 'default'> }
  | { slot: 'payload' };

function classifyToken(token: string): SuffixToken | undefined {
  const variant = VARIANT_TOKEN.exec(token);
  if (variant?.[1] !== undefined) {
    return { slot: 'variant', member: variant[1] };
  }
  const purpose = PURPOSE_TOKENS[token];
  if (purpose) {
    return { slot: 'purpose', purpose };
  }
  if (token === PAYLOAD_TOKEN) {
    return { slot: 'payload' };
  }
  return undefined;
}

function malformed(name: string, message: string): AssemblyWarning {
  return { kind: WARNING_KINDS.MALFORMED_SUFFIX, subject: name, message };
}

/**
 * Peels tag tokens off the right of a name. Peeling stops at the first
 * token that is not a tag and never leaves an empty base name, so
 * `resolveSuffixes(tags.baseName)` always comes back without tags.
 */
export function resolveSuffixes(name: string): SuffixTags {
  const tokens = name.split(TAG_DELIMITER);
  const warnings: AssemblyWarning[] = [];
  const tags: Omit<SuffixTags, 'baseName' | 'warnings' | 'variantGroup'> = {};
  let end = tokens.length;

  while (end > 1) {
    const token = tokens[end - 1] ?? '';
    const base = tokens.slice(0, end - 1).join(TAG_DELIMITER);
    if (base.length === 0) {
      break;
    }

    const tag = classifyToken(token);
    if (!tag) {
      if (token.startsWith(VARIANT_PREFIX)) {
        warnings.push(malformed(
          name,
          `'_${token}' has no numeric selector; kept as part of the name`
        ));
      }
      break;
    }

    // Tokens are read right to left, so a slot that is already filled
    // belongs to a token further right
    switch (tag.slot) {
      case 'variant':
        if (tags.variantMember !== undefined) {
          warnings.push(malformed(name, `Ignoring '_${token}': variant already set to '${tags.variantMember}'`));
        } else {
          tags.variantMember = tag.member;
        }
        break;
      case 'purpose':
        if (tags.purposeOverride !== undefined) {
          warnings.push(malformed(name, `Ignoring '_${token}': purpose already set to '${tags.purposeOverride}'`));
        } else {
          tags.purposeOverride = tag.purpose;
        }
        break;
      case 'payload':
        if (tags.payloadOverride !== undefined) {
          warnings.push(malformed(name, `Ignoring repeated '_${token}'`));
        } else {
          tags.payloadOverride = true;
        }
        break;
    }

    end -= 1;
  }

  const baseName = tokens.slice(0, end).join(TAG_DELIMITER);
  return {
    baseName,
    ...(tags.variantMember !== undefined ? { variantGroup: baseName } : {}),
    ...tags,
    warnings,
  };
}

/**
 * Builds a name that resolves back to the same tags.
 * Tokens are written as `Base_VARIANTn_PURPOSE_PAYLOAD`.
 */
export function composeSuffixedName(tags: Omit<SuffixTags, 'warnings'>): string {
  const parts = [tags.baseName];
  if (tags.variantMember !== undefined) {
    parts.push(`${VARIANT_PREFIX}${tags.variantMember}`);
  }
  if (tags.purposeOverride !== undefined) {
    parts.push(tags.purposeOverride.toUpperCase());
  }
  if (tags.payloadOverride) {
    parts.push(PAYLOAD_TOKEN);
  }
  return parts.join(TAG_DELIMITER);
}

/**
 * Orders variant selectors numerically, falling back to text order
 * for selectors with the same value ("1" before "01" is decided by text)
 */
export function compareSelectors(a: string, b: string): number {
  const byValue = Number(a) - Number(b);
  if (Number.isFinite(byValue) && byValue !== 0) {
    return byValue;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}
