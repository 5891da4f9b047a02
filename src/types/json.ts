/** JSON hodnota bez schématu - tak, jak dorazí ve zprávě */
export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/** Tvar uzlu v JSON stromu */
export type JsonKind = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null';

/**
 * Klasifikuje JSON uzel. Všechna místa, která se rozhodují podle tvaru
 * (path resolver, unflatten, serializace parametrů), jdou přes tuto funkci.
 */
export function jsonKind(value: JsonValue): JsonKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'object';
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Převede neznámou hodnotu (výsledek JSON.parse, YAML parseru, jmespath)
 * na JsonValue. Hodnoty, které v JSON nemají obdobu, vrací jako undefined.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : undefined;
    case 'object': {
      if (Array.isArray(value)) {
        const items: JsonValue[] = [];
        for (const item of value) {
          items.push(toJsonValue(item) ?? null);
        }
        return items;
      }
      if (value instanceof Date) {
        return value.toISOString();
      }
      const result: JsonObject = {};
      for (const [key, entry] of Object.entries(value)) {
        const converted = toJsonValue(entry);
        if (converted !== undefined) {
          result[key] = converted;
        }
      }
      return result;
    }
    default:
      return undefined;
  }
}
