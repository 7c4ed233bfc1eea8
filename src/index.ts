/**
 * vault-yaml
 *
 * Parser and serializer for the YAML subset used in note frontmatter.
 *
 * @example
 * ```typescript
 * import { parse, dump, y, field, loads, dumps } from 'vault-yaml';
 *
 * // Parse a frontmatter body (delimiters already removed)
 * const meta = parse('id: today\ntags:\n  - daily\ncomplete: false');
 * // => { type: 'map', entries: [{ key: 'id', ... }, { key: 'tags', ... }, ...] }
 *
 * // Build and render a tree
 * const text = dump(y.map(
 *   field('id', y.str('today')),
 *   field('aliases', y.list(y.str('Today'), y.str('2025: review'))),
 * ));
 * // => 'id: today\naliases:\n  - Today\n  - "2025: review"'
 *
 * // Work with plain objects instead
 * loads('aliases: [Foo, "Foo Baz"]');   // => { aliases: ['Foo', 'Foo Baz'] }
 * dumps({ title: 'Note', tags: [] });   // => 'title: Note\ntags: []'
 * ```
 */

// Core types
export {
  YamlType,
  YamlValue,
  ScalarValue,
  NullValue,
  BoolValue,
  NumberValue,
  StrValue,
  ListValue,
  MapValue,
  MapEntry,
  y,
  field,
  get,
  setEntry,
  equal,
  isScalar,
  dropNulls,
} from './types';

// Errors
export {
  YamlError,
  IndentationError,
  ScalarFormatError,
  UnterminatedLiteralError,
  KeyFormatError,
} from './errors';

// Line reader
export {
  Line,
  readLine,
  readLines,
  stripComment,
} from './line';

// Scalars
export {
  parseString,
  parseNumber,
  parseBoolean,
  parseNull,
  resolveScalar,
} from './scalar';

// Flow collections
export {
  decodeFlow,
} from './flow';

// Parser
export {
  parse,
  ParseOptions,
  defaultParseOptions,
} from './parse';

// Serializer
export {
  dump,
  DumpOptions,
  defaultDumpOptions,
} from './emit';

// Plain data conversion
export {
  fromJson,
  toJson,
} from './json';

// ============================================================
// Convenience: plain data in and out
// ============================================================

import { parse, ParseOptions } from './parse';
import { dump, DumpOptions } from './emit';
import { fromJson, toJson } from './json';

/**
 * Parse frontmatter text straight to plain data
 */
export function loads(text: string, options: ParseOptions = {}): unknown {
  return toJson(parse(text, options));
}

/**
 * Render plain data as frontmatter text
 */
export function dumps(data: unknown, options: DumpOptions = {}): string {
  return dump(fromJson(data), options);
}
