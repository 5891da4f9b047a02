/**
 * Dotted path resolution over JSON of unknown shape.
 *
 * A configured path such as `jsonPayload.dataObject.items.sku` says nothing
 * about where arrays sit in the actual message. The resolver walks the value
 * first to learn its shape, then tries progressively more explicit queries
 * until one yields a value.
 *
 * @module
 */

import type { JsonValue } from '../types/json.js';
import { isJsonObject, jsonKind } from '../types/json.js';
import type { FieldSpec } from '../types/config.js';
import type { QueryFn } from './json-query.js';
import { quoteSegment, searchJson } from './json-query.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export type ResolveResult =
  | { status: 'found'; value: JsonValue }
  | { status: 'missing'; depth: number }      // Index prvního segmentu, který ve zprávě chybí
  | { status: 'error'; error: string };

/** One step of the shape walk. */
export interface ShapeLevel {
  segment: string;
  kind: 'object' | 'list';
  /** Element of the parent list that holds the segment (list levels only). */
  listIndex?: number;
}

export type ShapeWalk =
  | { reached: true; levels: ShapeLevel[]; leaf: JsonValue }
  | { reached: false; levels: ShapeLevel[]; depth: number };

export interface PathResolverOptions {
  search?: QueryFn;
  logger?: Logger;
}

/** Splits a dotted path. Returns undefined for an empty path or an empty segment. */
export function splitPath(path: string): string[] | undefined {
  if (path.trim() === '') return undefined;
  const segments = path.split('.');
  return segments.every((segment) => segment !== '') ? segments : undefined;
}

/**
 * Walks the segments from the root. Objects descend on the key, arrays are
 * scanned for the first element that is an object holding the key. Anything
 * else stops the walk at that depth.
 */
export function walkShape(segments: readonly string[], root: JsonValue): ShapeWalk {
  const levels: ShapeLevel[] = [];
  let cursor: JsonValue = root;

  for (let depth = 0; depth < segments.length; depth++) {
    const segment = segments[depth] ?? '';

    switch (jsonKind(cursor)) {
      case 'object': {
        if (!isJsonObject(cursor) || !Object.hasOwn(cursor, segment)) {
          return { reached: false, levels, depth };
        }
        levels.push({ segment, kind: 'object' });
        cursor = cursor[segment] ?? null;
        break;
      }
      case 'array': {
        const items: JsonValue[] = Array.isArray(cursor) ? cursor : [];
        const listIndex = items.findIndex((item) => isJsonObject(item) && Object.hasOwn(item, segment));
        const match = items[listIndex];
        if (listIndex < 0 || !isJsonObject(match)) {
          return { reached: false, levels, depth };
        }
        levels.push({ segment, kind: 'list', listIndex });
        cursor = match[segment] ?? null;
        break;
      }
      default:
        return { reached: false, levels, depth };
    }
  }

  return { reached: true, levels, leaf: cursor };
}

/** Rebuilds an explicit query from the walked shape: `a.b[1].c`. */
export function buildStructuredQuery(levels: readonly ShapeLevel[]): string {
  let query = '';
  for (const level of levels) {
    if (level.listIndex !== undefined) {
      query += `[${level.listIndex}]`;
    }
    query += (query === '' ? '' : '.') + quoteSegment(level.segment);
  }
  return query;
}

export class PathResolver {
  private readonly search: QueryFn;
  private readonly logger: Logger;

  constructor(options: PathResolverOptions = {}) {
    this.search = options.search ?? searchJson;
    this.logger = options.logger ?? silentLogger;
  }

  resolve(path: string, value: JsonValue): ResolveResult {
    const segments = splitPath(path);
    if (segments === undefined) {
      return { status: 'error', error: `Malformed path: '${path}'` };
    }

    const shape = walkShape(segments, value);
    if (!shape.reached) {
      return { status: 'missing', depth: shape.depth };
    }

    const attempts: Array<[string, () => string | undefined]> = [
      ['direct', () => path],
      ['structured', () => buildStructuredQuery(shape.levels)],
      ['stepwise', () => this.stepwiseQuery(segments, value)],
    ];

    for (const [name, buildQuery] of attempts) {
      const result = this.attempt(name, path, buildQuery, value);
      if (result !== null) {
        return { status: 'found', value: result };
      }
    }

    if (shape.leaf === null) {
      return { status: 'found', value: null };
    }
    return { status: 'missing', depth: segments.length };
  }

  /** Value at the path, or undefined when it cannot be resolved. */
  get(path: string, value: JsonValue): JsonValue | undefined {
    const result = this.resolve(path, value);
    return result.status === 'found' ? result.value : undefined;
  }

  /**
   * Lazily yields `[lastSegment, value]` for every enabled spec. A field that
   * is not present yields null so the key is still recorded.
   */
  extractSelected(fields: readonly FieldSpec[], event: JsonValue): Iterable<[string, JsonValue]> {
    return {
      [Symbol.iterator]: () => this.selectedFields(fields, event),
    };
  }

  private *selectedFields(fields: readonly FieldSpec[], event: JsonValue): Generator<[string, JsonValue]> {
    for (const field of fields) {
      if (!field.enabled) continue;

      const segments = field.path.split('.');
      const key = segments[segments.length - 1] ?? field.path;
      const result = this.resolve(field.path, event);
      yield [key, result.status === 'found' ? result.value : null];
    }
  }

  private attempt(
    name: string,
    path: string,
    buildQuery: () => string | undefined,
    value: JsonValue,
  ): JsonValue {
    try {
      const query = buildQuery();
      if (query === undefined) return null;
      return this.search(value, query);
    } catch (err) {
      this.logger.debug({ path, strategy: name, err }, 'Path resolution attempt failed');
      return null;
    }
  }

  private stepwiseQuery(segments: readonly string[], root: JsonValue): string | undefined {
    const parts: string[] = [];
    let cursor: JsonValue = root;

    for (const segment of segments) {
      if (isJsonObject(cursor) && Object.hasOwn(cursor, segment)) {
        parts.push(quoteSegment(segment));
        cursor = cursor[segment] ?? null;
        continue;
      }

      if (Array.isArray(cursor) && cursor.length > 0) {
        const first: JsonValue = cursor[0] ?? null;
        if (!isJsonObject(first) || !Object.hasOwn(first, segment)) {
          return undefined;
        }
        appendIndex(parts);
        parts.push(quoteSegment(segment));
        cursor = first[segment] ?? null;
        continue;
      }

      return undefined;
    }

    return parts.join('.');
  }
}

function appendIndex(parts: string[]): void {
  const last = parts.length - 1;
  if (last < 0) {
    parts.push('[0]');
  } else {
    parts[last] = `${parts[last] ?? ''}[0]`;
  }
}

const defaultResolver = new PathResolver();

export function resolvePath(path: string, value: JsonValue): ResolveResult {
  return defaultResolver.resolve(path, value);
}

export function extractSelected(
  fields: readonly FieldSpec[],
  event: JsonValue,
): Iterable<[string, JsonValue]> {
  return defaultResolver.extractSelected(fields, event);
}
