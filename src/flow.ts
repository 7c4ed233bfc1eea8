/**
 * Flow-collection decoder
 *
 * Decodes bracketed inline collections such as `[a, 'b', [c]]` and
 * `{a: 1, b: [x, y]}`. A flow collection never spans lines.
 */

import { YamlValue, setEntry, y } from './types';
import { KeyFormatError, UnterminatedLiteralError } from './errors';
import { QuoteTracker } from './line';
import { parseString, resolveScalar } from './scalar';

const CLOSERS: Record<string, string> = { '[': ']', '{': '}' };

export function isFlowStart(s: string): boolean {
  return s[0] === '[' || s[0] === '{';
}

/**
 * Find the index of the bracket closing the one at position 0.
 * Throws when the text ends first.
 */
export function findFlowEnd(s: string, line: number = -1): number {
  const open: string[] = [];
  const quotes = new QuoteTracker();

  for (let i = 0; i < s.length; i++) {
    if (!quotes.feed(s, i)) continue;
    const c = s[i];
    if (c === '[' || c === '{') {
      open.push(CLOSERS[c]);
    } else if (c === ']' || c === '}') {
      if (open.pop() !== c) {
        throw new UnterminatedLiteralError(`mismatched '${c}' in flow collection`, line);
      }
      if (open.length === 0) return i;
    }
  }

  if (quotes.inQuote) {
    throw new UnterminatedLiteralError('unclosed quote in flow collection', line);
  }
  throw new UnterminatedLiteralError(`unclosed '${s[0]}'`, line);
}

/**
 * Decode a token that starts with `[` or `{`. When the matching bracket is
 * not the last character (`[Foo](bar)`) the token is a plain string.
 */
export function decodeFlowOrScalar(tok: string, line: number = -1): YamlValue {
  const s = tok.trim();
  if (!isFlowStart(s)) return resolveScalar(s);
  if (findFlowEnd(s, line) !== s.length - 1) return resolveScalar(s);
  return decodeFlow(s, line);
}

/**
 * Decode a complete flow collection.
 */
export function decodeFlow(tok: string, line: number = -1): YamlValue {
  const s = tok.trim();
  const end = findFlowEnd(s, line);
  if (end !== s.length - 1) {
    throw new UnterminatedLiteralError(`unexpected text after '${s[end]}'`, line);
  }

  const parts = splitTopLevel(s.slice(1, -1));
  if (parts.length > 0 && parts[parts.length - 1].trim() === '') {
    parts.pop();
  }

  if (s[0] === '[') {
    return y.list(...parts.map(p => decodeFlowOrScalar(p, line)));
  }

  const m = y.map();
  for (const part of parts) {
    const sep = findKeySeparator(part);
    if (sep < 0) {
      throw new KeyFormatError(`expected 'key: value' in flow mapping, got ${JSON.stringify(part.trim())}`, line);
    }
    const key = parseString(part.slice(0, sep));
    const rest = part.slice(sep + 1).trim();
    const value = rest === '' ? y.null() : decodeFlowOrScalar(rest, line);
    setEntry(m, key, value);
  }
  return m;
}

/**
 * Split on commas at nesting depth 0, outside quotes.
 */
function splitTopLevel(inner: string): string[] {
  const parts: string[] = [];
  const quotes = new QuoteTracker();
  let depth = 0;
  let start = 0;

  for (let i = 0; i < inner.length; i++) {
    if (!quotes.feed(inner, i)) continue;
    const c = inner[i];
    if (c === '[' || c === '{') {
      depth++;
    } else if (c === ']' || c === '}') {
      depth--;
    } else if (c === ',' && depth === 0) {
      parts.push(inner.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(inner.slice(start));

  return parts;
}

/**
 * First unquoted, unescaped colon at depth 0.
 */
function findKeySeparator(part: string): number {
  const quotes = new QuoteTracker();
  let depth = 0;
  for (let i = 0; i < part.length; i++) {
    if (!quotes.feed(part, i)) continue;
    const c = part[i];
    if (c === '[' || c === '{') {
      depth++;
    } else if (c === ']' || c === '}') {
      depth--;
    } else if (c === ':' && depth === 0 && part[i - 1] !== '\\') {
      return i;
    }
  }
  return -1;
}
