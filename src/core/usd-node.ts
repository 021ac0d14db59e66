/**
 * USD Node Class
 *
 * In-memory prim specs for the composition document. Nodes collect
 * metadata, composition arcs, attributes, variant sets and children,
 * then serialize themselves to USDA.
 */

import { UsdPath, UsdPathSchema } from '../schemas';
import { UsdErrorFactory } from '../errors';
import { USD_DEFAULT_NAMES } from '../constants/usd';
import {
  formatUsdAssetPath,
  formatUsdQuotedArray,
  formatUsdScalar,
  formatUsdString
} from '../utils/usd-formatter';

/**
 * Asset path value, written between `@` delimiters
 */
export class UsdAssetPath {
  constructor(readonly assetPath: string) {}
}

/**
 * String-valued dictionary, e.g. `assetInfo` or `variants`
 */
export type UsdDictionary = Readonly<Record<string, string>>;

export type UsdMetadataValue =
  | string
  | number
  | boolean
  | readonly string[]
  | UsdAssetPath
  | UsdDictionary;

/**
 * Attribute authored in a prim body, e.g. `uniform token purpose = "render"`
 */
interface UsdAttribute {
  declaration: string;
  value: string | number | boolean;
}

const INDENT = '    ';

/**
 * Renders one metadata value. Dictionaries span several lines and are
 * indented relative to the metadata key.
 */
function formatMetadataValue(value: UsdMetadataValue, space: string): string {
  if (value instanceof UsdAssetPath) {
    return formatUsdAssetPath(value.assetPath);
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return formatUsdScalar(value);
  }
  if (isStringArray(value)) {
    return formatUsdQuotedArray([...value]);
  }

  const entries = Object.entries(value);
  if (entries.length === 0) {
    return '{\n' + `${space}}`;
  }
  const lines = entries.map(([key, entry]) => `${space}${INDENT}string ${key} = ${formatUsdString(entry)}\n`);
  return `{\n${lines.join('')}${space}}`;
}

function isStringArray(value: UsdMetadataValue): value is readonly string[] {
  return Array.isArray(value);
}

/**
 * Opinions shared by prims and variants: metadata in parentheses,
 * attributes in the body.
 */
export abstract class UsdSpec {
  protected _metadata: Map<string, UsdMetadataValue> = new Map();
  protected _attributes: UsdAttribute[] = [];

  /**
   * Set metadata on this spec. Keys are written in insertion order.
   */
  setMetadata(key: string, value: UsdMetadataValue): this {
    this._metadata.set(key, value);
    return this;
  }

  /**
   * Get metadata value from this spec
   */
  getMetadata(key: string): UsdMetadataValue | undefined {
    return this._metadata.get(key);
  }

  /**
   * Set an attribute, replacing an earlier one with the same declaration
   */
  setAttribute(declaration: string, value: string | number | boolean): this {
    const existingIndex = this._attributes.findIndex(attr => attr.declaration === declaration);
    if (existingIndex !== -1) {
      this._attributes.splice(existingIndex, 1);
    }
    this._attributes.push({ declaration, value });
    return this;
  }

  getAttribute(declaration: string): string | number | boolean | undefined {
    return this._attributes.find(attr => attr.declaration === declaration)?.value;
  }

  protected *metadataChunks(space: string): Generator<string> {
    for (const [key, value] of this._metadata) {
      yield `${space}${INDENT}${key} = ${formatMetadataValue(value, space + INDENT)}\n`;
    }
  }

  protected attributeLines(space: string): string[] {
    return this._attributes.map(attr => `${space}${attr.declaration} = ${formatUsdScalar(attr.value)}\n`);
  }
}

/**
 * One alternative inside a variant set
 */
export class UsdVariant extends UsdSpec {
  constructor(readonly selector: string) {
    super();
  }

  *serializeToUsdaChunks(indent: number): Generator<string> {
    const space = INDENT.repeat(indent);
    const head = `${space}${formatUsdString(this.selector)}`;

    if (this._metadata.size > 0) {
      yield `${head} (\n`;
      yield* this.metadataChunks(space);
      yield `${space}) {\n`;
    } else {
      yield `${head} {\n`;
    }

    yield* this.attributeLines(space + INDENT);
    yield `${space}}\n`;
  }
}

/**
 * Named variant set; variants are written in insertion order
 */
export class UsdVariantSet {
  private _variants: Map<string, UsdVariant> = new Map();

  constructor(readonly name: string) {}

  /**
   * Get or create the variant with this selector
   */
  variant(selector: string): UsdVariant {
    let variant = this._variants.get(selector);
    if (!variant) {
      variant = new UsdVariant(selector);
      this._variants.set(selector, variant);
    }
    return variant;
  }

  *serializeToUsdaChunks(indent: number): Generator<string> {
    const space = INDENT.repeat(indent);
    yield `${space}variantSet ${formatUsdString(this.name)} = {\n`;
    for (const variant of this._variants.values()) {
      yield* variant.serializeToUsdaChunks(indent + 1);
    }
    yield `${space}}\n`;
  }
}

export class UsdNode extends UsdSpec {
  private _path: UsdPath;
  private _typeName: string;
  private _children: Map<string, UsdNode> = new Map();
  private _variantSets: Map<string, UsdVariantSet> = new Map();
  private _layerMetadata: Map<string, string | number> = new Map();

  constructor(path: UsdPath, typeName: string) {
    super();
    const parsed = UsdPathSchema.safeParse(path);
    if (!parsed.success) {
      throw UsdErrorFactory.schemaError(`Invalid USD path: ${path}`, path, parsed.error);
    }
    this._path = path;
    this._typeName = typeName;
  }

  /**
   * Set layer metadata, written in the header when this node is the layer root
   */
  setLayerMetadata(key: string, value: string | number): this {
    this._layerMetadata.set(key, value);
    return this;
  }

  /**
   * Add a child node. The child's path must sit directly under this node.
   */
  addChild(child: UsdNode): this {
    this._children.set(child.getName(), child);
    return this;
  }

  /**
   * Create a child prim below this node
   */
  createChild(name: string, typeName: string): UsdNode {
    const childPath = this._path === '/' ? `/${name}` : `${this._path}/${name}`;
    const child = new UsdNode(childPath, typeName);
    this.addChild(child);
    return child;
  }

  getChild(name: string): UsdNode | undefined {
    return this._children.get(name);
  }

  /**
   * Get or create a variant set on this node
   */
  variantSet(name: string): UsdVariantSet {
    let variantSet = this._variantSets.get(name);
    if (!variantSet) {
      variantSet = new UsdVariantSet(name);
      this._variantSets.set(name, variantSet);
    }
    return variantSet;
  }

  /**
   * Serialize this node to USDA format
   */
  serializeToUsda(indent: number = 0, skipHeader: boolean = false): string {
    let result = '';
    for (const chunk of this.serializeToUsdaChunks(indent, skipHeader)) {
      result += chunk;
    }
    return result;
  }

  /**
   * Serialize this node to USDA format as a generator of string chunks
   */
  *serializeToUsdaChunks(indent: number = 0, skipHeader: boolean = false): Generator<string> {
    if (indent === 0 && !skipHeader) {
      yield* this.headerChunks();
    }

    const space = INDENT.repeat(indent);
    const head = `${space}def ${this._typeName} ${formatUsdString(this.getName())}`;

    if (this._metadata.size > 0) {
      yield `${head} (\n`;
      yield* this.metadataChunks(space);
      yield `${space})\n`;
    } else {
      yield `${head}\n`;
    }

    yield `${space}{\n`;

    // Attributes, each variant set and each child form blank-line separated sections
    let first = true;
    const separator = function* (): Generator<string> {
      if (!first) {
        yield '\n';
      }
      first = false;
    };

    const attributes = this.attributeLines(space + INDENT);
    if (attributes.length > 0) {
      yield* separator();
      yield* attributes;
    }

    for (const variantSet of this._variantSets.values()) {
      yield* separator();
      yield* variantSet.serializeToUsdaChunks(indent + 1);
    }

    for (const child of this._children.values()) {
      yield* separator();
      yield* child.serializeToUsdaChunks(indent + 1, true);
    }

    yield `${space}}\n`;
  }

  private *headerChunks(): Generator<string> {
    yield '#usda 1.0\n';
    yield '(\n';
    yield `${INDENT}customLayerData = {\n`;
    yield `${INDENT}${INDENT}string creator = ${formatUsdString(USD_DEFAULT_NAMES.CREATOR)}\n`;
    yield `${INDENT}}\n`;
    for (const [key, value] of this._layerMetadata) {
      yield `${INDENT}${key} = ${formatUsdScalar(value)}\n`;
    }
    yield ')\n\n';
  }

  /**
   * Get the name of this node
   */
  getName(): string {
    const parts = this._path.split('/');
    return parts[parts.length - 1] ?? '';
  }

  /**
   * Get the full USD path of this node
   */
  getPath(): UsdPath {
    return this._path;
  }

  /**
   * Count this prim and every prim below it
   */
  countPrims(): number {
    let count = 1;
    for (const child of this._children.values()) {
      count += child.countPrims();
    }
    return count;
  }
}
