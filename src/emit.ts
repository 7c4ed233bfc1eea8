/**
 * Serializer
 *
 * Renders a YamlValue tree as block-style text, quoting strings only where
 * the parser would otherwise read them back differently.
 *
 * Rendering rules:
 * - null → empty (`key:` or `-`); a standalone null document, which has
 *   no text form of its own, renders as the empty string
 * - bool → true / false
 * - number → plain decimal text
 * - string → bare unless it needs quoting, then double-quoted with `"` escaped,
 *   or single-quoted when it ends in a backslash
 * - list → one `- item` per element; empty → []
 * - map → one `key: value` per entry in insertion order; empty → {}
 */

import { ListValue, MapValue, YamlValue } from './types';
import { isBooleanToken, isNullToken, isNumberToken } from './scalar';

// ============================================================
// Options
// ============================================================

export interface DumpOptions {
  /**
   * Spaces per nesting level (default: 2). Must be at least 2 so that a
   * dash and its space fit in one step.
   */
  indent?: number;
}

export function defaultDumpOptions(): Required<DumpOptions> {
  return {
    indent: 2,
  };
}

/**
 * Render a value tree as frontmatter text (without `---` delimiters or a
 * trailing newline).
 */
export function dump(value: YamlValue, options: DumpOptions = {}): string {
  const indent = options.indent ?? defaultDumpOptions().indent;
  if (!Number.isInteger(indent) || indent < 2) {
    throw new RangeError(`indent must be an integer >= 2, got ${indent}`);
  }
  return new Emitter(indent).document(value).join('\n');
}

// ============================================================
// String Quoting
// ============================================================

const SPECIAL_START = new Set(['&', '!', '-', '{', '[', "'", '"', '#', '|']);

/** Digit runs joined by single `.`, `_`, `:` or space characters */
const DATE_LIKE = /^\d+(?:[._: ]\d+)+$/;

/**
 * Whether a string must be quoted to read back as the same string.
 * Keys are always read as strings, so they skip the typed-token check.
 */
export function needsQuoting(s: string, isKey: boolean = false): boolean {
  if (s.trim() === '') return true;
  if (s !== s.trim()) return true;
  // A trailing backslash would escape the key separator or closing quote.
  if (s.endsWith('\\')) return true;
  if (!isKey && (isNullToken(s) || isBooleanToken(s) || isNumberToken(s))) return true;
  if (DATE_LIKE.test(s)) return false;
  if (/:(\s|$)/.test(s)) return true;
  if (SPECIAL_START.has(s[0])) return true;
  return /\s#/.test(s);
}

export function quoteString(s: string): string {
  if (s.endsWith('\\') && !s.includes("'")) {
    return "'" + s + "'";
  }
  return '"' + s.replace(/"/g, '\\"') + '"';
}

export function renderString(s: string, isKey: boolean = false): string {
  const flat = s.replace(/\r?\n/g, ' ');
  return needsQuoting(flat, isKey) ? quoteString(flat) : flat;
}

function renderNumber(n: number): string {
  if (!Number.isFinite(n)) {
    throw new Error('NaN/Infinity cannot be represented');
  }
  if (Object.is(n, -0)) return '0';
  return String(n);
}

// ============================================================
// Emitter
// ============================================================

/**
 * Non-empty collections, which take lines of their own.
 */
function asBlock(v: YamlValue): ListValue | MapValue | null {
  if (v.type === 'list' && v.items.length > 0) return v;
  if (v.type === 'map' && v.entries.length > 0) return v;
  return null;
}

class Emitter {
  constructor(private step: number) {}

  document(v: YamlValue): string[] {
    switch (v.type) {
      case 'null':
        return [''];
      case 'list':
        return v.items.length === 0 ? ['[]'] : this.listLines(v, 0);
      case 'map':
        return v.entries.length === 0 ? ['{}'] : this.mapLines(v, 0);
      default:
        return [this.inline(v)];
    }
  }

  private pad(depth: number): string {
    return ' '.repeat(depth * this.step);
  }

  /**
   * Values that always fit on one line: scalars and empty collections.
   */
  private inline(v: YamlValue): string {
    switch (v.type) {
      case 'null':
        return '';
      case 'bool':
        return v.value ? 'true' : 'false';
      case 'number':
        return renderNumber(v.value);
      case 'str':
        return renderString(v.value);
      case 'list':
        return '[]';
      case 'map':
        return '{}';
    }
  }

  private nested(v: ListValue | MapValue, depth: number): string[] {
    return v.type === 'list' ? this.listLines(v, depth) : this.mapLines(v, depth);
  }

  private listLines(list: ListValue, depth: number): string[] {
    const pad = this.pad(depth);
    const lines: string[] = [];

    for (const item of list.items) {
      const block = asBlock(item);
      if (block) {
        // Compact form: the first line of the nested block shares the dash's line.
        const inner = this.nested(block, depth + 1);
        inner[0] = pad + '-' + ' '.repeat(this.step - 1) + inner[0].slice(pad.length + this.step);
        lines.push(...inner);
      } else if (item.type === 'null') {
        lines.push(pad + '-');
      } else {
        lines.push(pad + '- ' + this.inline(item));
      }
    }

    return lines;
  }

  private mapLines(map: MapValue, depth: number): string[] {
    const pad = this.pad(depth);
    const lines: string[] = [];

    for (const { key, value } of map.entries) {
      const head = pad + renderString(key, true) + ':';
      const block = asBlock(value);
      if (block) {
        lines.push(head, ...this.nested(block, depth + 1));
      } else if (value.type === 'null') {
        lines.push(head);
      } else if (value.type === 'str' && value.value.includes('\n')) {
        lines.push(head + ' |', ...this.blockLines(value.value, depth + 1));
      } else {
        lines.push(head + ' ' + this.inline(value));
      }
    }

    return lines;
  }

  private blockLines(s: string, depth: number): string[] {
    const pad = this.pad(depth);
    return s.split(/\r?\n/).map(line => (line === '' ? '' : pad + line));
  }
}
