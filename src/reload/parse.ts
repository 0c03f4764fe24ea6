import path from 'path';
import YAML from 'yaml';
import { RELOAD_CONSTANTS } from '../config/constants.js';
import { ConfigParseError, getErrorMessage } from '../utils/error-utils.js';

export type ConfigObject = Record<string, unknown>;

// Merging through these would write to Object.prototype
const FORBIDDEN_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

export function isPlainObject(value: unknown): value is ConfigObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function usesJson(filename: string): boolean {
  const ext = path.extname(filename).toLowerCase();
  return RELOAD_CONSTANTS.JSON_EXTENSIONS.some((candidate) => candidate === ext);
}

/**
 * Decode a config document. `.json` files go through JSON.parse, anything
 * else through YAML. An empty document decodes to an empty object.
 */
export function parseConfigDocument(content: string, filename: string): ConfigObject {
  let parsed: unknown;

  try {
    parsed = usesJson(filename) ? JSON.parse(content) : YAML.parse(content);
  } catch (error) {
    throw new ConfigParseError(filename, getErrorMessage(error), error);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigParseError(filename, `expected a mapping at the top level, got ${Array.isArray(parsed) ? 'a list' : typeof parsed}`);
  }

  return parsed;
}

/**
 * Merge `patch` into `target` in place. Nested mappings merge key by key;
 * lists and scalars replace. With `strict`, a key the target does not
 * already have is an error; `__proto__`, `constructor` and `prototype` always are.
 */
export function mergeConfig(
  target: ConfigObject,
  patch: ConfigObject,
  filename: string,
  strict = false,
  keyPath: string[] = []
): void {
  for (const [key, value] of Object.entries(patch)) {
    const fieldPath = [...keyPath, key];

    if (FORBIDDEN_KEYS.has(key)) {
      throw new ConfigParseError(filename, `forbidden field "${fieldPath.join('.')}"`);
    }

    if (strict && !Object.prototype.hasOwnProperty.call(target, key)) {
      throw new ConfigParseError(filename, `unknown field "${fieldPath.join('.')}"`);
    }

    const current = target[key];
    if (isPlainObject(current) && isPlainObject(value)) {
      mergeConfig(current, value, filename, strict, fieldPath);
    } else {
      target[key] = value;
    }
  }
}

/**
 * Deep copy of a config value. Defaults must be structured-cloneable.
 */
export function cloneConfig<T>(value: T): T {
  return structuredClone(value);
}
