/**
 * Query configuration validation (`config.db.querys`).
 *
 * @module
 */

import {
  PARAMETER_TYPES,
  QUERY_KINDS,
  STRUCTURAL_PLACEHOLDERS,
  isParameterType,
  isQueryKind,
  isStrategyName,
} from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject, isBooleanFlag } from '../types.js';

const INDEX_RE = /^(0|[1-9][0-9]*)$/;

export function validateQueries(
  queries: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(queries)) {
    collector.addError(path, 'querys must be an object keyed by query kind');
    return;
  }

  for (const [kind, query] of Object.entries(queries)) {
    if (!isQueryKind(kind)) {
      collector.addError(`${path}.${kind}`, `Unknown query kind: ${kind}. Valid kinds: ${QUERY_KINDS.join(', ')}`);
      continue;
    }
    validateQuery(query, `${path}.${kind}`, collector);
  }
}

function validateQuery(
  query: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(query)) {
    collector.addError(path, 'Query must be an object with "query" and "params"');
    return;
  }

  if (typeof query['query'] !== 'string' || query['query'].trim() === '') {
    collector.addError(`${path}.query`, 'Query text must be a non-empty string');
  }

  const params = query['params'];
  const entries = parameterEntries(params);
  if (entries === undefined) {
    collector.addError(`${path}.params`, 'params must be an object keyed by index or an array');
    return;
  }
  if (entries.length === 0) {
    collector.addError(`${path}.params`, 'Query has no parameters');
    return;
  }

  const indices: number[] = [];
  for (const [key, spec] of entries) {
    const specPath = `${path}.params.${key}`;
    if (!INDEX_RE.test(key)) {
      collector.addError(specPath, `Parameter index must be a non-negative integer, got "${key}"`);
      continue;
    }
    indices.push(Number(key));
    validateParameter(spec, specPath, collector);
  }

  indices.sort((a, b) => a - b);
  for (let i = 0; i < indices.length; i++) {
    if (indices[i] !== i) {
      collector.addError(`${path}.params`, `Parameter indices must be contiguous from 0; missing index ${i}`);
      break;
    }
  }
}

/** `[indexKey, spec]` pairs from either the keyed-object or the array form. */
export function parameterEntries(params: unknown): Array<[string, unknown]> | undefined {
  if (Array.isArray(params)) {
    return params.map((spec: unknown, position): [string, unknown] => {
      const index = isObject(spec) && typeof spec['index'] === 'number' ? spec['index'] : position;
      return [String(index), spec];
    });
  }
  if (isObject(params)) {
    return Object.entries(params);
  }
  return undefined;
}

function validateParameter(
  spec: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(spec)) {
    collector.addError(path, 'Parameter must be an object');
    return;
  }

  const type = spec['type'] ?? 'parameter';
  if (typeof type !== 'string' || !isParameterType(type)) {
    collector.addError(`${path}.type`, `Parameter type must be one of: ${PARAMETER_TYPES.join(', ')}`);
    return;
  }

  const placeholder = spec['placeholder'];
  if (typeof placeholder !== 'string' || placeholder === '') {
    collector.addError(`${path}.placeholder`, 'Parameter must have a non-empty "placeholder"');
  } else if (type === 'structural' && !STRUCTURAL_PLACEHOLDERS.some((name) => name === placeholder)) {
    collector.addWarning(
      `${path}.placeholder`,
      `No resolver for structural placeholder "${placeholder}"; it is substituted as written`,
    );
  }

  if (type === 'parameter') {
    const requires = spec['requires'];
    if (typeof requires !== 'string' || requires === '') {
      collector.addError(`${path}.requires`, 'Parameter must name its strategy in "requires"');
    } else if (!isStrategyName(requires)) {
      collector.addWarning(`${path}.requires`, `Unknown strategy: ${requires}; the parameter resolves to null`);
    }
  }

  if (Object.hasOwn(spec, 'require_ext') && !isBooleanFlag(spec['require_ext'])) {
    collector.addError(`${path}.require_ext`, 'require_ext must be true or false');
  }
}
