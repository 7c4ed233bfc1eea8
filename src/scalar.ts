/**
 * Scalar resolver
 *
 * Classifies a single token as null, boolean, number or string.
 * Resolution order: null, boolean, number, quoted string, plain string.
 */

import { ScalarValue, y } from './types';
import { ScalarFormatError } from './errors';

const NUMBER_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Trim, then strip one pair of matching surrounding quotes. Inside double
 * quotes `\"` becomes `"`; no other escape is interpreted.
 */
export function parseString(tok: string): string {
  const s = tok.trim();
  if (s.length >= 2) {
    const q = s[0];
    if ((q === '"' || q === "'") && s[s.length - 1] === q) {
      const inner = s.slice(1, -1);
      return q === '"' ? inner.replace(/\\"/g, '"') : inner;
    }
  }
  return s;
}

export function parseNumber(tok: string, line: number = -1): number {
  const s = tok.trim();
  if (!NUMBER_RE.test(s)) {
    throw new ScalarFormatError(`invalid number: ${JSON.stringify(s)}`, line);
  }
  return Number(s);
}

export function parseBoolean(tok: string, line: number = -1): boolean {
  const s = tok.trim();
  if (s === 'true') return true;
  if (s === 'false') return false;
  throw new ScalarFormatError(`invalid boolean: ${JSON.stringify(s)}`, line);
}

export function parseNull(tok: string, line: number = -1): null {
  const s = tok.trim();
  if (s === '' || s === 'null') return null;
  throw new ScalarFormatError(`invalid null: ${JSON.stringify(s)}`, line);
}

export function isNullToken(s: string): boolean {
  return s === '' || s === 'null';
}

export function isBooleanToken(s: string): boolean {
  return s === 'true' || s === 'false';
}

export function isNumberToken(s: string): boolean {
  return NUMBER_RE.test(s);
}

/**
 * Resolve a token to its typed scalar. Never fails: a token that is not
 * null, boolean or number is a string.
 */
export function resolveScalar(tok: string): ScalarValue {
  const s = tok.trim();
  if (isNullToken(s)) return y.null();
  if (isBooleanToken(s)) return y.bool(s === 'true');
  if (isNumberToken(s)) return y.num(Number(s));
  return y.str(parseString(s));
}
