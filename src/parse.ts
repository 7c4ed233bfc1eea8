/**
 * Block Parser
 *
 * Parses the indentation-based YAML subset used for note frontmatter into a
 * YamlValue tree. Containers are tracked on an explicit indentation stack;
 * only flow collections recurse.
 */

import { ListValue, MapValue, YamlValue, dropNulls, setEntry, y } from './types';
import { IndentationError, KeyFormatError, UnterminatedLiteralError } from './errors';
import {
  Line,
  QuoteTracker,
  isBlank,
  isCommentOnly,
  isUnclosedQuote,
  readLines,
  stripComment,
} from './line';
import { parseString, resolveScalar } from './scalar';
import { decodeFlowOrScalar, isFlowStart } from './flow';

// ============================================================
// Options
// ============================================================

export interface ParseOptions {
  /**
   * Keep mapping entries whose value is null (default: true).
   * When false they are removed, recursively.
   */
  keepNulls?: boolean;
}

export function defaultParseOptions(): Required<ParseOptions> {
  return {
    keepNulls: true,
  };
}

/**
 * Parse a frontmatter body (without its `---` delimiters).
 */
export function parse(text: string, options: ParseOptions = {}): YamlValue {
  const keepNulls = options.keepNulls ?? defaultParseOptions().keepNulls;
  const value = new BlockParser(text).parse();
  return keepNulls ? value : dropNulls(value);
}

// ============================================================
// Line Classification
// ============================================================

export type Classified =
  | { kind: 'item'; rest: string; offset: number }
  | { kind: 'entry'; key: string; rawKey: string; rest: string }
  | { kind: 'scalar'; text: string };

type EntryLine = Extract<Classified, { kind: 'entry' }>;

const BLOCK_INDICATOR = /^\|[-+]?$/;

export function isItemContent(content: string): boolean {
  return content === '-' || content.startsWith('- ') || content.startsWith('-\t');
}

/**
 * Classify trimmed line content as a sequence item, a mapping entry or a
 * plain scalar. For items, `offset` is the distance from the dash to the
 * item's value and comments are stripped from the value alone, so `- #tag`
 * keeps its text.
 */
export function classify(content: string): Classified {
  if (isItemContent(content)) {
    const after = content.slice(1);
    const rest = after.trimStart();
    return { kind: 'item', rest: stripComment(rest), offset: 1 + after.length - rest.length };
  }

  const text = stripComment(content);
  if (!isFlowStart(text)) {
    const sep = findEntrySeparator(text);
    if (sep >= 0) {
      const rawKey = text.slice(0, sep).trim();
      return {
        kind: 'entry',
        key: parseString(rawKey),
        rawKey,
        rest: text.slice(sep + 1).trim(),
      };
    }
  }
  return { kind: 'scalar', text };
}

/**
 * First unquoted, unescaped colon followed by whitespace or end of text.
 */
function findEntrySeparator(text: string): number {
  const quotes = new QuoteTracker();
  for (let i = 0; i < text.length; i++) {
    if (!quotes.feed(text, i)) continue;
    if (text[i] !== ':' || text[i - 1] === '\\') continue;
    if (i + 1 === text.length || /\s/.test(text[i + 1])) {
      return i;
    }
  }
  return -1;
}

// ============================================================
// Parser
// ============================================================

interface Frame {
  indent: number;
  node: ListValue | MapValue;
}

class BlockParser {
  private lines: Line[];
  private pos: number = 0;
  private stack: Frame[] = [];

  constructor(text: string) {
    this.lines = readLines(text);
  }

  parse(): YamlValue {
    const first = this.nextContent();
    if (!first) {
      return y.null();
    }
    if (first.indent !== 0) {
      throw new IndentationError(
        `invalid indentation: document must start at column 0, got ${first.indent}`,
        first.lineNo
      );
    }

    const c = classify(first.content);
    if (c.kind === 'scalar') {
      return this.parseScalarDocument(c.text, first.lineNo);
    }

    const root = c.kind === 'item' ? y.list() : y.map();
    this.stack.push({ indent: 0, node: root });
    this.consume(first.content, 0, first.lineNo);

    let line: Line | null;
    while ((line = this.nextContent()) !== null) {
      this.resolveIndent(line);
      this.consume(line.content, line.indent, line.lineNo);
    }

    return root;
  }

  private parseScalarDocument(text: string, lineNo: number): YamlValue {
    const value = isFlowStart(text)
      ? decodeFlowOrScalar(text, lineNo)
      : this.scalarValue(text, 0, lineNo);

    const extra = this.nextContent();
    if (extra) {
      if (extra.indent > 0) {
        throw new IndentationError(`unexpected indentation after document scalar`, extra.lineNo);
      }
      throw new KeyFormatError(`unexpected text after document scalar: ${JSON.stringify(extra.content)}`, extra.lineNo);
    }
    return value;
  }

  // ------------------------------------------------------------
  // Indentation
  // ------------------------------------------------------------

  private top(): Frame {
    return this.stack[this.stack.length - 1];
  }

  private resolveIndent(line: Line): void {
    while (this.stack.length > 1 && line.indent < this.top().indent) {
      this.stack.pop();
    }

    const top = this.top();
    if (line.indent !== top.indent) {
      throw new IndentationError(
        `unexpected indentation: expected ${top.indent}, got ${line.indent}`,
        line.lineNo
      );
    }

    // A sequence written at its key's own column ends at the next non-dash line.
    if (top.node.type === 'list' && this.stack.length > 1 && !isItemContent(line.content)) {
      const parent = this.stack[this.stack.length - 2];
      if (parent.indent === top.indent) {
        this.stack.pop();
      }
    }
  }

  // ------------------------------------------------------------
  // Containers
  // ------------------------------------------------------------

  private consume(content: string, column: number, lineNo: number): void {
    const node = this.top().node;
    const c = classify(content);

    if (node.type === 'list') {
      if (c.kind !== 'item') {
        throw new IndentationError(
          `invalid indentation: expected a sequence item at column ${column}`,
          lineNo
        );
      }
      this.consumeItem(node, c.rest, column + c.offset, column, lineNo);
      return;
    }

    if (c.kind !== 'entry') {
      throw new KeyFormatError(`expected 'key: value', got ${JSON.stringify(content)}`, lineNo);
    }
    this.consumeEntry(node, c, column, lineNo);
  }

  /**
   * A key absent from the text is rejected; a quoted empty key (`"": x`) is
   * the empty string.
   */
  private consumeEntry(node: MapValue, entry: EntryLine, column: number, lineNo: number): void {
    if (entry.rawKey === '') {
      throw new KeyFormatError('empty mapping key', lineNo);
    }
    setEntry(node, entry.key, this.entryValue(entry.rest, column, lineNo));
  }

  private entryValue(rest: string, column: number, lineNo: number): YamlValue {
    if (rest === '') {
      return this.deferredValue(column, true);
    }
    if (BLOCK_INDICATOR.test(rest)) {
      return this.blockScalar(column);
    }
    if (isFlowStart(rest)) {
      return decodeFlowOrScalar(rest, lineNo);
    }
    return this.scalarValue(rest, column, lineNo);
  }

  /**
   * @param inner - column where the item's value starts
   * @param column - column of the dash
   */
  private consumeItem(node: ListValue, rest: string, inner: number, column: number, lineNo: number): void {
    if (rest === '') {
      node.items.push(this.deferredValue(column, false));
      return;
    }
    if (isFlowStart(rest)) {
      node.items.push(decodeFlowOrScalar(rest, lineNo));
      return;
    }

    const c = classify(rest);
    switch (c.kind) {
      case 'item': {
        const child = y.list();
        node.items.push(child);
        this.stack.push({ indent: inner, node: child });
        this.consumeItem(child, c.rest, inner + c.offset, inner, lineNo);
        return;
      }
      case 'entry': {
        const child = y.map();
        node.items.push(child);
        this.stack.push({ indent: inner, node: child });
        this.consumeEntry(child, c, inner, lineNo);
        return;
      }
      case 'scalar':
        node.items.push(this.scalarValue(c.text, column, lineNo));
        return;
    }
  }

  /**
   * Value of a key or dash with nothing after it, decided by the next
   * content line. Dash items may sit at the owner's own column when the
   * owner is a mapping key.
   */
  private deferredValue(owner: number, sameColumnItems: boolean): YamlValue {
    const next = this.peekContent();
    if (!next) {
      return y.null();
    }

    const c = classify(next.content);
    if (c.kind === 'item' && (next.indent > owner || (sameColumnItems && next.indent === owner))) {
      const child = y.list();
      this.stack.push({ indent: next.indent, node: child });
      return child;
    }
    if (next.indent <= owner) {
      return y.null();
    }
    if (c.kind === 'entry') {
      const child = y.map();
      this.stack.push({ indent: next.indent, node: child });
      return child;
    }

    this.nextContent();
    const text = c.kind === 'item' ? next.content : c.text;
    return isFlowStart(text)
      ? decodeFlowOrScalar(text, next.lineNo)
      : this.scalarValue(text, owner, next.lineNo);
  }

  // ------------------------------------------------------------
  // Scalars
  // ------------------------------------------------------------

  /**
   * Resolve a scalar, folding more-indented continuation lines into it
   * when it is a string or an open quote.
   */
  private scalarValue(text: string, owner: number, lineNo: number): YamlValue {
    if (!isUnclosedQuote(text)) {
      const head = resolveScalar(text);
      if (head.type !== 'str') return head;
      const next = this.peekContent();
      if (!next || next.indent <= owner) return head;
    }
    return y.str(this.fold(text, owner, lineNo));
  }

  private fold(text: string, owner: number, lineNo: number): string {
    const folded = new FoldedScalar();
    folded.take(text);

    while (this.pos < this.lines.length) {
      const line = this.lines[this.pos];
      if (isBlank(line)) {
        this.pos++;
        continue;
      }
      if (line.indent <= owner) break;
      this.pos++;

      // Inside an open quote nothing is a comment.
      if (folded.open) {
        folded.take(line.content);
      } else if (!isCommentOnly(line)) {
        folded.take(stripComment(line.content));
      }
    }

    if (folded.open) {
      throw new UnterminatedLiteralError('unclosed quoted scalar', lineNo);
    }
    return folded.text();
  }

  /**
   * Lines deeper than the owner, verbatim. Indentation past the first
   * line's is kept as spaces; interior blank lines are kept.
   */
  private blockScalar(owner: number): YamlValue {
    const out: string[] = [];
    let base = -1;
    let blanks = 0;

    while (this.pos < this.lines.length) {
      const line = this.lines[this.pos];
      if (isBlank(line)) {
        blanks++;
        this.pos++;
        continue;
      }
      if (line.indent <= owner) break;

      if (base < 0) base = line.indent;
      if (out.length > 0) {
        for (; blanks > 0; blanks--) out.push('');
      }
      blanks = 0;
      out.push(' '.repeat(Math.max(0, line.indent - base)) + line.content);
      this.pos++;
    }

    return y.str(out.join('\n'));
  }

  // ------------------------------------------------------------
  // Line Cursor
  // ------------------------------------------------------------

  private contentIndex(): number {
    let i = this.pos;
    while (i < this.lines.length && (isBlank(this.lines[i]) || isCommentOnly(this.lines[i]))) {
      i++;
    }
    return i;
  }

  private peekContent(): Line | null {
    const i = this.contentIndex();
    return i < this.lines.length ? this.lines[i] : null;
  }

  private nextContent(): Line | null {
    const i = this.contentIndex();
    if (i >= this.lines.length) return null;
    this.pos = i + 1;
    return this.lines[i];
  }
}

/**
 * Accumulates the segments of a folded scalar. Each segment is resolved as a
 * string on its own, except that a quote left open collects raw segments
 * until it closes.
 */
class FoldedScalar {
  private parts: string[] = [];
  private pending: string | null = null;

  get open(): boolean {
    return this.pending !== null;
  }

  take(segment: string): void {
    if (this.pending !== null) {
      const joined = this.pending + ' ' + segment;
      if (isUnclosedQuote(joined)) {
        this.pending = joined;
      } else {
        this.parts.push(parseString(stripComment(joined)));
        this.pending = null;
      }
    } else if (isUnclosedQuote(segment)) {
      this.pending = segment;
    } else {
      this.parts.push(parseString(segment));
    }
  }

  text(): string {
    return this.parts.join(' ');
  }
}
