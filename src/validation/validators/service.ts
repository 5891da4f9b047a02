/**
 * Service validation.
 *
 * @module
 */

import type { IssueCollector } from '../types.js';
import { isObject, isBooleanFlag, pickAlias } from '../types.js';

export const SERVICE_ID_KEYS = ['id_service', 'idService'] as const;

export function validateServices(
  services: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!Array.isArray(services)) {
    collector.addError(path, 'Services must be an array');
    return;
  }

  for (let i = 0; i < services.length; i++) {
    validateService(services[i], `${path}[${i}]`, collector);
  }
}

function validateService(
  service: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(service)) {
    collector.addError(path, 'Service must be an object');
    return;
  }

  const id = pickAlias(service, SERVICE_ID_KEYS);
  if (id === undefined || typeof id[1] !== 'string' || id[1].trim() === '') {
    collector.addError(`${path}.id_service`, 'Service must have a non-empty "id_service"');
  }

  const entity = service['entity'];
  if (entity !== undefined) {
    if (!Array.isArray(entity) || !entity.every((name) => typeof name === 'string' && name !== '')) {
      collector.addError(`${path}.entity`, 'entity must be an array of non-empty strings');
    }
  }

  const paths = service['paths'];
  if (paths === undefined) return;
  if (!Array.isArray(paths)) {
    collector.addError(`${path}.paths`, 'paths must be an array');
    return;
  }

  for (let i = 0; i < paths.length; i++) {
    validateFieldSpec(paths[i], `${path}.paths[${i}]`, collector);
  }
}

/** `[path, "true"|"false"]` or `{ path, enabled }`. */
function validateFieldSpec(
  spec: unknown,
  path: string,
  collector: IssueCollector,
): void {
  let fieldPath: unknown;
  let enabled: unknown;

  if (Array.isArray(spec)) {
    [fieldPath, enabled = true] = spec;
  } else if (isObject(spec)) {
    fieldPath = spec['path'];
    enabled = spec['enabled'] ?? true;
  } else {
    collector.addError(path, 'Path entry must be [path, enabled] or { path, enabled }');
    return;
  }

  if (typeof fieldPath !== 'string' || fieldPath.split('.').some((segment) => segment === '')) {
    collector.addError(path, 'Path must be a dotted string without empty segments');
  }
  if (!isBooleanFlag(enabled)) {
    collector.addError(path, 'Path flag must be "true" or "false"');
  }
}
