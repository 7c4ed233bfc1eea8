/**
 * Plain Data Conversion
 *
 * Converts between plain JavaScript values and YamlValue trees.
 */

import { MapEntry, YamlValue, field, y } from './types';

// ============================================================
// Plain Data to YamlValue
// ============================================================

/**
 * Convert a plain value to a YamlValue.
 *
 * Accepts null/undefined, booleans, finite numbers, strings, arrays, plain
 * objects and Maps with string keys. Dates become ISO-8601 strings.
 */
export function fromJson(data: unknown): YamlValue {
  if (data === null || data === undefined) {
    return y.null();
  }

  if (typeof data === 'boolean') {
    return y.bool(data);
  }

  if (typeof data === 'number') {
    if (!Number.isFinite(data)) {
      throw new Error('NaN/Infinity not allowed in frontmatter');
    }
    return y.num(data);
  }

  if (typeof data === 'string') {
    return y.str(data);
  }

  if (data instanceof Date) {
    return y.str(data.toISOString());
  }

  if (Array.isArray(data)) {
    return y.list(...data.map(item => fromJson(item)));
  }

  if (data instanceof Map) {
    const entries: MapEntry[] = [];
    for (const [key, value] of data) {
      if (typeof key !== 'string') {
        throw new Error(`Unsupported map key type: ${typeof key}`);
      }
      entries.push(field(key, fromJson(value)));
    }
    return y.map(...entries);
  }

  if (typeof data === 'object') {
    return y.map(...Object.entries(data).map(([key, value]) => field(key, fromJson(value))));
  }

  throw new Error(`Unsupported value type: ${typeof data}`);
}

// ============================================================
// YamlValue to Plain Data
// ============================================================

/**
 * Convert a YamlValue to plain data. Maps become plain objects whose key
 * order follows the entries (integer-like keys aside, which JavaScript
 * objects always list first).
 */
export function toJson(v: YamlValue): unknown {
  switch (v.type) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'str':
      return v.value;
    case 'list':
      return v.items.map(toJson);
    case 'map':
      return Object.fromEntries(v.entries.map(e => [e.key, toJson(e.value)]));
  }
}
