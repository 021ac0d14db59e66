/**
 * USDA Outline
 *
 * Structural view of a text layer: layer metadata, prim headers, prim
 * metadata and prim bodies. Property statements and metadata values are
 * kept as opaque text, so anything the rewriter does not touch is written
 * back the way it was read. Comment lines inside prim bodies, metadata
 * blocks and bracketed values are kept; comments at the layer root and
 * after a statement on the same line are dropped.
 */

import { LAYER_MAGIC } from '../constants/config';
import { UsdErrorFactory } from '../errors';

export type UsdaSpecifier = 'def' | 'over' | 'class';

export interface UsdaLine {
  text: string;
  /** Line continues a multi-line string; written back without indentation */
  verbatim: boolean;
}

export interface UsdaStatement {
  kind: 'statement';
  lines: UsdaLine[];
}

export interface UsdaPrim {
  kind: 'prim';
  specifier: UsdaSpecifier;
  typeName?: string;
  name: string;
  metadata: UsdaStatement[];
  body: UsdaBodyItem[];
}

export type UsdaBodyItem = UsdaStatement | UsdaPrim;

export interface UsdaOutline {
  header: string;
  layerMetadata: UsdaStatement[];
  rootPrims: UsdaPrim[];
}

export const INDENT = '    ';
const TRIPLE_QUOTES = ['"""', "'''"] as const;
const PRIM_START = /(def|over|class)[ \t]+(?=["A-Za-z_])/y;
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_:.]*/y;
const OPENERS = '([{';
const CLOSERS = ')]}';

function isSpecifier(value: string): value is UsdaSpecifier {
  return value === 'def' || value === 'over' || value === 'class';
}

/**
 * Character scanner over USDA source. Strings, asset paths and comments
 * are skipped as units so brackets inside them never count.
 */
class UsdaScanner {
  private i = 0;
  private line = 1;

  constructor(private readonly src: string) {}

  get eof(): boolean {
    return this.i >= this.src.length;
  }

  peek(offset: number = 0): string {
    return this.src[this.i + offset] ?? '';
  }

  fail(message: string): never {
    throw UsdErrorFactory.syntaxError(message, this.line);
  }

  private advance(count: number): void {
    for (let k = 0; k < count && this.i < this.src.length; k++) {
      if (this.src[this.i] === '\n') this.line++;
      this.i++;
    }
  }

  /**
   * Skip whitespace, newlines and comments
   */
  skipTrivia(): void {
    while (!this.eof) {
      const ch = this.peek();
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
        this.advance(1);
      } else if (ch === '#') {
        this.skipComment();
      } else {
        return;
      }
    }
  }

  /**
   * Skip whitespace and newlines, stopping at a comment
   */
  skipBlank(): void {
    while (this.peek() === ' ' || this.peek() === '\t' || this.peek() === '\r' || this.peek() === '\n') {
      this.advance(1);
    }
  }

  /**
   * Read a comment running to the end of the line as its own statement
   */
  readComment(): UsdaStatement {
    const start = this.i;
    this.skipComment();
    return { kind: 'statement', lines: [{ text: this.src.slice(start, this.i).trimEnd(), verbatim: false }] };
  }

  skipInlineSpace(): void {
    while (this.peek() === ' ' || this.peek() === '\t') {
      this.advance(1);
    }
  }

  private skipComment(): void {
    while (!this.eof && this.peek() !== '\n') {
      this.advance(1);
    }
  }

  /**
   * Read the rest of the current line; used for the `#usda` header
   */
  readLine(): string {
    const start = this.i;
    this.skipComment();
    return this.src.slice(start, this.i).trim();
  }

  expect(ch: string): void {
    if (this.peek() !== ch) {
      this.fail(`Expected '${ch}' but found '${this.peek() || 'end of file'}'`);
    }
    this.advance(1);
  }

  atPrimStart(): boolean {
    PRIM_START.lastIndex = this.i;
    return PRIM_START.test(this.src);
  }

  readIdentifier(): string {
    IDENTIFIER.lastIndex = this.i;
    const match = IDENTIFIER.exec(this.src);
    if (!match) {
      this.fail(`Expected identifier but found '${this.peek() || 'end of file'}'`);
    }
    this.advance(match[0].length);
    return match[0];
  }

  /**
   * Read a single-line quoted string and return its contents
   */
  readQuoted(): string {
    const quote = this.peek();
    if (quote !== '"' && quote !== "'") {
      this.fail(`Expected quoted name but found '${quote || 'end of file'}'`);
    }
    this.advance(1);
    const start = this.i;
    while (!this.eof && this.peek() !== quote) {
      if (this.peek() === '\n') this.fail('Unterminated string');
      this.advance(this.peek() === '\\' ? 2 : 1);
    }
    const value = this.src.slice(start, this.i);
    this.expect(quote);
    return value;
  }

  private columnOf(offset: number): number {
    return offset - (this.src.lastIndexOf('\n', offset - 1) + 1);
  }

  /**
   * Read one statement: everything up to a newline outside brackets, or up
   * to a closing bracket that belongs to the enclosing block (left unread).
   */
  readStatement(): UsdaStatement {
    const column = this.columnOf(this.i);
    const lines: UsdaLine[] = [];
    let current = '';
    let verbatim = false;
    let depth = 0;

    const breakLine = (continuesString: boolean): void => {
      lines.push({ text: current, verbatim });
      current = '';
      verbatim = continuesString;
    };

    while (!this.eof) {
      const ch = this.peek();

      if (ch === '\n') {
        if (depth === 0) break;
        breakLine(false);
        this.advance(1);
        continue;
      }
      if (ch === '\r') {
        this.advance(1);
        continue;
      }
      if (ch === '#') {
        const start = this.i;
        this.skipComment();
        if (depth > 0) current += this.src.slice(start, this.i);
        continue;
      }
      if (ch === ';' && depth === 0) {
        this.advance(1);
        break;
      }

      const triple = TRIPLE_QUOTES.find(q => this.src.startsWith(q, this.i));
      if (triple) {
        current += triple;
        this.advance(3);
        while (!this.eof && !this.src.startsWith(triple, this.i)) {
          const inner = this.peek();
          if (inner === '\n') {
            breakLine(true);
          } else {
            current += inner;
          }
          this.advance(1);
        }
        if (this.eof) this.fail('Unterminated multi-line string');
        current += triple;
        this.advance(3);
        continue;
      }

      if (ch === '"' || ch === "'") {
        const start = this.i;
        this.advance(1);
        while (!this.eof && this.peek() !== ch) {
          if (this.peek() === '\n') this.fail('Unterminated string');
          this.advance(this.peek() === '\\' ? 2 : 1);
        }
        this.expect(ch);
        current += this.src.slice(start, this.i);
        continue;
      }

      if (ch === '@') {
        const delimiter = this.src.startsWith('@@@', this.i) ? '@@@' : '@';
        const end = this.src.indexOf(delimiter, this.i + delimiter.length);
        if (end === -1) this.fail('Unterminated asset path');
        const stop = end + delimiter.length;
        current += this.src.slice(this.i, stop);
        this.advance(stop - this.i);
        continue;
      }

      if (OPENERS.includes(ch)) {
        depth++;
      } else if (CLOSERS.includes(ch)) {
        if (depth === 0) break;
        depth--;
      }

      current += ch;
      this.advance(1);
    }

    if (depth !== 0) {
      this.fail('Unbalanced brackets');
    }
    lines.push({ text: current, verbatim });

    return { kind: 'statement', lines: normalizeLines(lines, column) };
  }
}

/**
 * Trim the statement and shift continuation lines left by the column the
 * statement started at, so it can be re-indented anywhere.
 */
function normalizeLines(lines: UsdaLine[], column: number): UsdaLine[] {
  const normalized = lines.map((line, index) => {
    if (line.verbatim) return line;
    let text = line.text.replace(/\s+$/, '');
    if (index === 0) {
      text = text.trimStart();
    } else {
      const leading = /^[ \t]*/.exec(text)?.[0].length ?? 0;
      text = text.slice(Math.min(leading, column));
    }
    return { text, verbatim: false };
  });

  while (normalized.length > 0) {
    const last = normalized[normalized.length - 1];
    if (last && !last.verbatim && last.text.length === 0) {
      normalized.pop();
    } else {
      break;
    }
  }
  return normalized;
}

function isEmptyStatement(statement: UsdaStatement): boolean {
  return statement.lines.length === 0;
}

export function isCommentStatement(item: UsdaBodyItem | undefined): boolean {
  return item?.kind === 'statement' && (item.lines[0]?.text.startsWith('#') ?? false);
}

/**
 * Read `( ... )` metadata items
 */
function parseMetadataBlock(scanner: UsdaScanner): UsdaStatement[] {
  const items: UsdaStatement[] = [];
  scanner.expect('(');
  for (;;) {
    scanner.skipBlank();
    if (scanner.peek() === '#') {
      items.push(scanner.readComment());
      continue;
    }
    if (scanner.peek() === ')') {
      scanner.expect(')');
      return items;
    }
    if (scanner.eof) scanner.fail("Expected ')' to close metadata");
    const item = scanner.readStatement();
    if (isEmptyStatement(item)) {
      if (CLOSERS.includes(scanner.peek())) scanner.fail(`Unexpected '${scanner.peek()}' in metadata`);
      continue;
    }
    items.push(item);
  }
}

function parsePrim(scanner: UsdaScanner): UsdaPrim {
  const specifier = scanner.readIdentifier();
  if (!isSpecifier(specifier)) {
    scanner.fail(`Unknown specifier '${specifier}'`);
  }
  scanner.skipInlineSpace();

  let typeName: string | undefined;
  if (scanner.peek() !== '"' && scanner.peek() !== "'") {
    typeName = scanner.readIdentifier();
    scanner.skipInlineSpace();
  }
  const name = scanner.readQuoted();

  scanner.skipTrivia();
  const metadata = scanner.peek() === '(' ? parseMetadataBlock(scanner) : [];

  scanner.skipTrivia();
  scanner.expect('{');

  const body: UsdaBodyItem[] = [];
  for (;;) {
    scanner.skipBlank();
    if (scanner.peek() === '#') {
      body.push(scanner.readComment());
      continue;
    }
    if (scanner.peek() === '}') {
      scanner.expect('}');
      break;
    }
    if (scanner.eof) scanner.fail(`Expected '}' to close prim '${name}'`);

    if (scanner.atPrimStart()) {
      body.push(parsePrim(scanner));
      continue;
    }
    const statement = scanner.readStatement();
    if (isEmptyStatement(statement)) {
      if (CLOSERS.includes(scanner.peek())) scanner.fail(`Unexpected '${scanner.peek()}' in prim '${name}'`);
      continue;
    }
    body.push(statement);
  }

  return {
    kind: 'prim',
    specifier,
    ...(typeName !== undefined ? { typeName } : {}),
    name,
    metadata,
    body,
  };
}

/**
 * Parse USDA text into an outline. Throws `UsdaSyntaxError` on text it
 * cannot follow.
 */
export function parseUsdaOutline(text: string): UsdaOutline {
  const scanner = new UsdaScanner(text);
  const header = scanner.readLine();
  if (!header.startsWith(LAYER_MAGIC.USDA)) {
    scanner.fail(`Missing '${LAYER_MAGIC.USDA}' header`);
  }

  scanner.skipTrivia();
  const layerMetadata = scanner.peek() === '(' ? parseMetadataBlock(scanner) : [];

  const rootPrims: UsdaPrim[] = [];
  for (;;) {
    scanner.skipTrivia();
    if (scanner.eof) break;
    if (!scanner.atPrimStart()) {
      scanner.fail(`Expected prim definition but found '${scanner.peek()}'`);
    }
    rootPrims.push(parsePrim(scanner));
  }

  return { header, layerMetadata, rootPrims };
}

const BLANK_LINE: UsdaLine = { text: '', verbatim: false };

function structural(text: string): UsdaLine {
  return { text, verbatim: false };
}

function* statementLines(statement: UsdaStatement, space: string): Generator<UsdaLine> {
  for (const line of statement.lines) {
    yield line.verbatim || line.text.length === 0 ? line : structural(`${space}${line.text}`);
  }
}

/**
 * Lines of one prim indented to `depth`. Continuations of multi-line
 * strings stay verbatim.
 */
export function* primLines(prim: UsdaPrim, depth: number): Generator<UsdaLine> {
  const space = INDENT.repeat(depth);
  const type = prim.typeName !== undefined ? ` ${prim.typeName}` : '';
  const head = `${space}${prim.specifier}${type} "${prim.name}"`;

  if (prim.metadata.length > 0) {
    yield structural(`${head} (`);
    for (const item of prim.metadata) {
      yield* statementLines(item, space + INDENT);
    }
    yield structural(`${space})`);
  } else {
    yield structural(head);
  }

  yield structural(`${space}{`);
  let previous: UsdaBodyItem | undefined;
  for (const item of prim.body) {
    // Blank line around child prims; a comment stays with the prim it precedes
    if (previous && ((item.kind === 'prim' && !isCommentStatement(previous)) || previous.kind === 'prim')) {
      yield BLANK_LINE;
    }
    if (item.kind === 'prim') {
      yield* primLines(item, depth + 1);
    } else {
      yield* statementLines(item, space + INDENT);
    }
    previous = item;
  }
  yield structural(`${space}}`);
}

/**
 * Write an outline back to USDA text. Serializing a parsed serialization
 * gives the same text again.
 */
export function serializeUsdaOutline(outline: UsdaOutline): string {
  let result = `${outline.header}\n`;
  if (outline.layerMetadata.length > 0) {
    result += '(\n';
    for (const item of outline.layerMetadata) {
      for (const line of statementLines(item, INDENT)) {
        result += `${line.text}\n`;
      }
    }
    result += ')\n';
  }
  for (const prim of outline.rootPrims) {
    result += '\n';
    for (const line of primLines(prim, 0)) {
      result += `${line.text}\n`;
    }
  }
  return result;
}

/**
 * Child prims of a prim, in order
 */
export function childPrims(prim: UsdaPrim): UsdaPrim[] {
  return prim.body.filter((item): item is UsdaPrim => item.kind === 'prim');
}

/**
 * Call `visit` for every prim in the layer, parents before children
 */
export function walkPrims(prims: readonly UsdaPrim[], visit: (prim: UsdaPrim) => void): void {
  for (const prim of prims) {
    visit(prim);
    walkPrims(childPrims(prim), visit);
  }
}

const DEFAULT_PRIM_ITEM = /^defaultPrim\s*=\s*"([^"]*)"\s*$/;

export function getLayerDefaultPrim(outline: UsdaOutline): string | undefined {
  for (const item of outline.layerMetadata) {
    const match = DEFAULT_PRIM_ITEM.exec(item.lines[0]?.text ?? '');
    if (match) return match[1];
  }
  return undefined;
}

/**
 * Set the layer's defaultPrim; returns whether the value changed
 */
export function setLayerDefaultPrim(outline: UsdaOutline, name: string): boolean {
  if (getLayerDefaultPrim(outline) === name) {
    return false;
  }
  const statement: UsdaStatement = {
    kind: 'statement',
    lines: [{ text: `defaultPrim = "${name}"`, verbatim: false }],
  };
  const index = outline.layerMetadata.findIndex(item => /^defaultPrim\s*=/.test(item.lines[0]?.text ?? ''));
  if (index === -1) {
    outline.layerMetadata.push(statement);
  } else {
    outline.layerMetadata[index] = statement;
  }
  return true;
}
