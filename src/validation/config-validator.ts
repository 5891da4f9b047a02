/**
 * Consumer configuration validator.
 *
 * Validates a whole configuration document and returns all issues (errors +
 * warnings) rather than throwing on the first problem. Accepts both the
 * bare array of consumers and the `{ version, consumers, extensions }`
 * envelope.
 *
 * @module
 */

import { IssueCollector, isObject, hasProperty } from './types.js';
import type { ValidationResult } from './types.js';
import { validateServices } from './validators/service.js';
import { validateRules } from './validators/rule.js';
import { validateQueries } from './validators/query.js';

export class ConfigValidator {
  validate(input: unknown): ValidationResult {
    const collector = new IssueCollector();

    if (Array.isArray(input)) {
      this.validateConsumers(input, 'consumers', collector);
      return collector.toResult();
    }

    if (!isObject(input)) {
      collector.addError('', 'Configuration must be an array of consumers or an object with "consumers"');
      return collector.toResult();
    }

    if (hasProperty(input, 'version') && typeof input['version'] !== 'string') {
      collector.addError('version', 'Field "version" must be a string');
    }

    if (hasProperty(input, 'extensions') && !isObject(input['extensions'])) {
      collector.addError('extensions', 'Field "extensions" must be an object of named datasets');
    }

    const consumers = input['consumers'];
    if (!Array.isArray(consumers)) {
      collector.addError('consumers', 'Field "consumers" must be an array');
      return collector.toResult();
    }

    this.validateConsumers(consumers, 'consumers', collector);
    return collector.toResult();
  }

  /** Validates one consumer document. */
  validateConsumer(input: unknown, path = ''): ValidationResult {
    const collector = new IssueCollector();
    this.validateConsumerInto(input, path, collector);
    return collector.toResult();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private validateConsumers(consumers: unknown[], path: string, collector: IssueCollector): void {
    if (consumers.length === 0) {
      collector.addWarning(path, 'Configuration defines no consumers');
    }

    const ids = new Set<string>();
    for (let i = 0; i < consumers.length; i++) {
      const consumer: unknown = consumers[i];
      const prefix = `${path}[${i}]`;
      this.validateConsumerInto(consumer, prefix, collector);

      if (isObject(consumer) && typeof consumer['id'] === 'string') {
        if (ids.has(consumer['id'])) {
          collector.addWarning(`${prefix}.id`, `Duplicate consumer ID: ${consumer['id']}; entries are merged`);
        }
        ids.add(consumer['id']);
      }
    }
  }

  private validateConsumerInto(consumer: unknown, prefix: string, collector: IssueCollector): void {
    if (!isObject(consumer)) {
      collector.addError(prefix, 'Consumer must be an object');
      return;
    }

    const id = consumer['id'];
    if (!hasProperty(consumer, 'id')) {
      collector.addError(this.fieldPath(prefix, 'id'), 'Required field "id" is missing');
    } else if (typeof id !== 'string' || id.trim() === '') {
      collector.addError(this.fieldPath(prefix, 'id'), 'Field "id" must be a non-empty string');
    }

    if (hasProperty(consumer, 'services')) {
      validateServices(consumer['services'], this.fieldPath(prefix, 'services'), collector);
    }

    if (hasProperty(consumer, 'rules')) {
      validateRules(consumer['rules'], this.fieldPath(prefix, 'rules'), collector);
    }

    const config = consumer['config'];
    if (config === undefined) return;
    if (!isObject(config)) {
      collector.addError(this.fieldPath(prefix, 'config'), 'Field "config" must be an object');
      return;
    }
    const db = config['db'];
    if (db === undefined) return;
    if (!isObject(db)) {
      collector.addError(this.fieldPath(prefix, 'config.db'), 'Field "config.db" must be an object');
      return;
    }
    if (db['querys'] !== undefined) {
      validateQueries(db['querys'], this.fieldPath(prefix, 'config.db.querys'), collector);
    }
  }

  private fieldPath(prefix: string, field: string): string {
    return prefix ? `${prefix}.${field}` : field;
  }
}
