import * as crypto from 'crypto';
import { InvalidArgumentError } from '../common/errors';
import { cloneJson, isJsonObject, JsonValue, ownValue, setOwnValue } from '../common/json';
import { CONFIG_METADATA_KEY, ConfigData } from './FileConfigStore';

export type MergeStrategy = 'override' | 'deep_merge' | 'append';

export const MERGE_STRATEGIES: readonly MergeStrategy[] = ['override', 'deep_merge', 'append'];

export interface ConfigDiff {
  added: ConfigData;
  removed: ConfigData;
  modified: Record<string, { old: JsonValue; new: JsonValue }>;
  unchanged: ConfigData;
}

export type TemplateFieldType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

export interface TemplateField {
  name: string;
  type?: TemplateFieldType;
  default?: JsonValue;
  description?: string;
}

/**
 * Copy of `data` without the store's `_metadata` stamp
 */
export function stripMetadata(data: ConfigData): ConfigData {
  const copy = cloneJson(data);
  delete copy[CONFIG_METADATA_KEY];
  return copy;
}

/**
 * Recursively merge `update` into `base` in place. Nested objects merge;
 * anything else from `update` replaces what `base` had.
 */
export function deepMerge(base: ConfigData, update: ConfigData): ConfigData {
  for (const [key, value] of Object.entries(update)) {
    const existing = ownValue(base, key);
    if (isJsonObject(existing) && isJsonObject(value)) {
      deepMerge(existing, value);
    } else {
      setOwnValue(base, key, cloneJson(value));
    }
  }
  return base;
}

/**
 * Fold configurations left to right. `append` concatenates arrays that
 * appear on both sides and otherwise overrides.
 */
export function mergeConfigData(configs: ConfigData[], strategy: MergeStrategy = 'override'): ConfigData {
  const merged: ConfigData = {};

  for (const config of configs.map(stripMetadata)) {
    switch (strategy) {
      case 'override':
        for (const [key, value] of Object.entries(config)) {
          setOwnValue(merged, key, value);
        }
        break;
      case 'deep_merge':
        deepMerge(merged, config);
        break;
      case 'append':
        for (const [key, value] of Object.entries(config)) {
          const existing = ownValue(merged, key);
          setOwnValue(merged, key, Array.isArray(existing) && Array.isArray(value) ? [...existing, ...value] : value);
        }
        break;
      default:
        throw new InvalidArgumentError(`Unknown merge strategy '${String(strategy)}'`);
    }
  }

  return merged;
}

/**
 * Top-level key comparison between two versions of a configuration
 */
export function diffConfigs(before: ConfigData, after: ConfigData): ConfigDiff {
  const diff: ConfigDiff = { added: {}, removed: {}, modified: {}, unchanged: {} };
  const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
  const modified: Array<[string, { old: JsonValue; new: JsonValue }]> = [];

  for (const key of keys) {
    const oldValue = ownValue(before, key);
    const newValue = ownValue(after, key);
    if (oldValue === undefined && newValue !== undefined) {
      setOwnValue(diff.added, key, newValue);
    } else if (newValue === undefined && oldValue !== undefined) {
      setOwnValue(diff.removed, key, oldValue);
    } else if (oldValue !== undefined && newValue !== undefined) {
      if (canonicalJson(oldValue) === canonicalJson(newValue)) {
        setOwnValue(diff.unchanged, key, oldValue);
      } else {
        modified.push([key, { old: oldValue, new: newValue }]);
      }
    }
  }

  diff.modified = Object.fromEntries(modified);
  return diff;
}

/**
 * JSON with object keys sorted at every level, so equal values serialize alike
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (isJsonObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .map(key => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

export function configChecksum(data: ConfigData): string {
  return crypto.createHash('sha256').update(canonicalJson(data)).digest('hex');
}

/**
 * Build a template document: placeholder values per field plus
 * `_template` / `_template_info` markers.
 */
export function templateFromFields(name: string, fields: TemplateField[], createdAt: string): ConfigData {
  const template: ConfigData = {
    _template: true,
    _template_info: {
      name,
      created: createdAt,
      fields: fields.map(field => {
        const info: ConfigData = { name: field.name, type: field.type ?? 'string' };
        if (field.default !== undefined) info.default = cloneJson(field.default);
        if (field.description !== undefined) info.description = field.description;
        return info;
      })
    }
  };

  for (const field of fields) {
    if (field.name.startsWith('_')) {
      throw new InvalidArgumentError(`Template field '${field.name}' must not start with '_'`);
    }
    setOwnValue(template, field.name, field.default !== undefined ? cloneJson(field.default) : placeholderFor(field));
  }

  return template;
}

function placeholderFor(field: TemplateField): JsonValue {
  switch (field.type ?? 'string') {
    case 'string':
      return `<${field.name}>`;
    case 'integer':
    case 'number':
      return 0;
    case 'boolean':
      return false;
    case 'array':
      return [];
    case 'object':
      return {};
  }
}
