/**
 * Core Types
 *
 * YamlValue is the value tree produced by `parse` and consumed by `dump`.
 */

export type YamlType = 'null' | 'bool' | 'number' | 'str' | 'list' | 'map';

export interface NullValue {
  readonly type: 'null';
}

export interface BoolValue {
  readonly type: 'bool';
  value: boolean;
}

export interface NumberValue {
  readonly type: 'number';
  value: number;
}

export interface StrValue {
  readonly type: 'str';
  value: string;
}

export interface ListValue {
  readonly type: 'list';
  items: YamlValue[];
}

export interface MapValue {
  readonly type: 'map';
  /** Entries in first-seen order */
  entries: MapEntry[];
}

export interface MapEntry {
  key: string;
  value: YamlValue;
}

export type YamlValue = NullValue | BoolValue | NumberValue | StrValue | ListValue | MapValue;

export type ScalarValue = NullValue | BoolValue | NumberValue | StrValue;

/**
 * Create a field entry for map construction
 */
export function field(key: string, value: YamlValue): MapEntry {
  return { key, value };
}

/**
 * Shorthand constructors
 */
export const y = {
  null: (): NullValue => ({ type: 'null' }),
  bool: (value: boolean): BoolValue => ({ type: 'bool', value }),
  num: (value: number): NumberValue => ({ type: 'number', value }),
  str: (value: string): StrValue => ({ type: 'str', value }),
  list: (...items: YamlValue[]): ListValue => ({ type: 'list', items }),
  map: (...entries: MapEntry[]): MapValue => {
    const m: MapValue = { type: 'map', entries: [] };
    for (const e of entries) {
      setEntry(m, e.key, e.value);
    }
    return m;
  },
  field,
};

export function isScalar(v: YamlValue): v is ScalarValue {
  return v.type !== 'list' && v.type !== 'map';
}

/**
 * Look up a key on a map value.
 */
export function get(v: YamlValue, key: string): YamlValue | undefined {
  if (v.type !== 'map') return undefined;
  return v.entries.find(e => e.key === key)?.value;
}

/**
 * Set a key on a map. An existing key keeps its position.
 */
export function setEntry(m: MapValue, key: string, value: YamlValue): void {
  const existing = m.entries.find(e => e.key === key);
  if (existing) {
    existing.value = value;
  } else {
    m.entries.push({ key, value });
  }
}

/**
 * Structural equality. Entry order is significant for maps.
 */
export function equal(a: YamlValue, b: YamlValue): boolean {
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'bool':
      return b.type === 'bool' && a.value === b.value;
    case 'number':
      return b.type === 'number' && (a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)));
    case 'str':
      return b.type === 'str' && a.value === b.value;
    case 'list': {
      if (b.type !== 'list') return false;
      const other = b.items;
      return a.items.length === other.length && a.items.every((item, i) => equal(item, other[i]));
    }
    case 'map': {
      if (b.type !== 'map') return false;
      const other = b.entries;
      return a.entries.length === other.length
        && a.entries.every((e, i) => e.key === other[i].key && equal(e.value, other[i].value));
    }
  }
}

/**
 * Remove null-valued map entries, recursively.
 */
export function dropNulls(v: YamlValue): YamlValue {
  switch (v.type) {
    case 'list':
      return y.list(...v.items.map(dropNulls));
    case 'map':
      return y.map(...v.entries
        .filter(e => e.value.type !== 'null')
        .map(e => field(e.key, dropNulls(e.value))));
    default:
      return v;
  }
}
