import type { JsonObject, JsonValue } from '../types/json.js';
import { isJsonObject, jsonKind } from '../types/json.js';

const INDEX_RE = /^(0|[1-9][0-9]*)$/;

/** True when a top-level key carries a dotted path (`a.b.0.c`). */
export function isFlattened(value: JsonValue): boolean {
  return isJsonObject(value) && Object.keys(value).some((key) => key.includes('.'));
}

/**
 * Re-nests an event whose keys are dotted paths. Objects whose keys are the
 * contiguous indices 0..n-1 become arrays again. Values that are not
 * flattened are returned as they are.
 */
export function unflatten(value: JsonValue): JsonValue {
  if (!isFlattened(value) || !isJsonObject(value)) {
    return value;
  }

  const root: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    insert(root, key.split('.'), entry);
  }
  return restoreArrays(root);
}

function insert(target: JsonObject, segments: string[], value: JsonValue): void {
  let cursor = target;
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i] ?? '';
    const next = cursor[segment];
    if (isJsonObject(next)) {
      cursor = next;
    } else {
      const created: JsonObject = {};
      cursor[segment] = created;
      cursor = created;
    }
  }
  const leaf = segments[segments.length - 1] ?? '';
  const existing = cursor[leaf];
  if (isJsonObject(existing) && isJsonObject(value)) {
    Object.assign(existing, value);
  } else {
    cursor[leaf] = value;
  }
}

function restoreArrays(value: JsonValue): JsonValue {
  switch (jsonKind(value)) {
    case 'array':
      return Array.isArray(value) ? value.map(restoreArrays) : value;
    case 'object': {
      if (!isJsonObject(value)) return value;
      const keys = Object.keys(value);
      const converted: JsonObject = {};
      for (const key of keys) {
        converted[key] = restoreArrays(value[key] ?? null);
      }
      if (keys.length > 0 && keys.every((key) => INDEX_RE.test(key))) {
        const indices = keys.map(Number).sort((a, b) => a - b);
        if (indices.every((index, position) => index === position)) {
          return indices.map((index) => converted[String(index)] ?? null);
        }
      }
      return converted;
    }
    default:
      return value;
  }
}
