import { describe, it, expect } from 'vitest';
import { ConfigValidator } from '../../../src/validation/config-validator.js';
import type { ValidationIssue } from '../../../src/validation/types.js';

const validator = new ConfigValidator();

function paths(issues: ValidationIssue[]): string[] {
  return issues.map((issue) => issue.path);
}

function consumerWith(fields: Record<string, unknown>): unknown {
  return { consumers: [{ id: 'C1', ...fields }] };
}

describe('ConfigValidator', () => {
  describe('document shape', () => {
    it('accepts the envelope and a bare consumer array', () => {
      expect(validator.validate({ version: '1', consumers: [{ id: 'C1' }], extensions: {} }))
        .toEqual({ valid: true, errors: [], warnings: [] });
      expect(validator.validate([{ id: 'C1' }]).valid).toBe(true);
    });

    it('rejects anything else', () => {
      expect(validator.validate('consumers').errors).toEqual([{
        path: '(root)',
        message: 'Configuration must be an array of consumers or an object with "consumers"',
        severity: 'error',
      }]);
      expect(paths(validator.validate({ consumers: {} }).errors)).toEqual(['consumers']);
    });

    it('checks version and extensions', () => {
      const result = validator.validate({ version: 1, extensions: [], consumers: [{ id: 'C1' }] });

      expect(paths(result.errors)).toEqual(['version', 'extensions']);
    });

    it('warns about an empty consumer list and duplicate ids', () => {
      expect(validator.validate({ consumers: [] }).warnings).toEqual([{
        path: 'consumers',
        message: 'Configuration defines no consumers',
        severity: 'warning',
      }]);

      const duplicated = validator.validate([{ id: 'C1' }, { id: 'C1' }]);
      expect(duplicated.valid).toBe(true);
      expect(paths(duplicated.warnings)).toEqual(['consumers[1].id']);
    });

    it('requires a consumer id', () => {
      const result = validator.validate([{}, { id: ' ' }, 'C3']);

      expect(result.errors.map((issue) => [issue.path, issue.message])).toEqual([
        ['consumers[0].id', 'Required field "id" is missing'],
        ['consumers[1].id', 'Field "id" must be a non-empty string'],
        ['consumers[2]', 'Consumer must be an object'],
      ]);
    });
  });

  describe('services', () => {
    it('accepts both field spec forms', () => {
      const result = validator.validate(consumerWith({
        services: [{
          id_service: 'SVC1',
          entity: ['orders'],
          paths: [['a.b', 'true'], { path: 'a.c', enabled: false }, ['a.d']],
        }],
      }));

      expect(result.errors).toEqual([]);
    });

    it('reports malformed services', () => {
      const result = validator.validate(consumerWith({
        services: [{ entity: 'orders', paths: [['a..b', 'yes'], 42] }],
      }));

      expect(result.errors.map((issue) => issue.path)).toEqual([
        'consumers[0].services[0].id_service',
        'consumers[0].services[0].entity',
        'consumers[0].services[0].paths[0]',
        'consumers[0].services[0].paths[0]',
        'consumers[0].services[0].paths[1]',
      ]);
    });
  });

  describe('rules', () => {
    const rule = {
      id_rule: 'r1',
      event_type: 'SVC1',
      priority: 2,
      conditions: [{ field: 'a', operator: 'equals', value: 1 }],
      actions: [{ field: 'x', action: 'set_fixed_value', value: 1 }],
    };

    it('accepts a complete rule', () => {
      expect(validator.validate(consumerWith({ rules: [rule] }))).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('requires id, event type and actions', () => {
      const result = validator.validate(consumerWith({ rules: [{ conditions: [] }] }));

      expect(paths(result.errors)).toEqual([
        'consumers[0].rules[0].id_rule',
        'consumers[0].rules[0].event_type',
        'consumers[0].rules[0].actions',
      ]);
    });

    it('rejects unknown operators and operands of the wrong type', () => {
      const result = validator.validate(consumerWith({
        rules: [{
          ...rule,
          conditions: [
            { field: 'a', operator: 'between', value: 1 },
            { field: 'a', operator: 'in', value: 'x' },
            { field: 'a', operator: 'less_than', value: true },
          ],
        }],
      }));

      expect(result.errors.map((issue) => [issue.path, issue.message])).toEqual([
        [
          'consumers[0].rules[0].conditions[0].operator',
          'Invalid operator: between. Valid operators: exists, matches_query, equals, not_equals, in, contains, greater_than, less_than',
        ],
        ['consumers[0].rules[0].conditions[1].value', 'Operator "in" requires an array value'],
        ['consumers[0].rules[0].conditions[2].value', 'Operator "less_than" requires a number or string value'],
      ]);
    });

    it('checks the validity period', () => {
      const bad = validator.validate(consumerWith({
        rules: [{ ...rule, validity_period: { start_date: '2024-01-01' } }],
      }));
      const reversed = validator.validate(consumerWith({
        rules: [{ ...rule, validity_period: { start_date: '2025-01-01T00:00:00Z', end_date: '2024-01-01T00:00:00Z' } }],
      }));

      expect(paths(bad.errors)).toEqual(['consumers[0].rules[0].validity_period.start_date']);
      expect(reversed.warnings.map((issue) => issue.message)).toEqual([
        'validity_period starts after it ends; the rule never applies',
      ]);
    });

    it('checks the camelCase validity period', () => {
      const result = validator.validate(consumerWith({
        rules: [{ ...rule, validityPeriod: { end: 'not-a-date' } }],
      }));

      expect(paths(result.errors)).toEqual(['consumers[0].rules[0].validityPeriod.end']);
    });

    it('rejects timestamps naming days that do not exist', () => {
      const result = validator.validate(consumerWith({
        rules: [{ ...rule, validity_period: { start_date: '2024-02-29T00:00:00Z', end_date: '2020-02-31T00:00:00Z' } }],
      }));

      expect(paths(result.errors)).toEqual(['consumers[0].rules[0].validity_period.end_date']);
    });

    it('checks strategy payloads', () => {
      const result = validator.validate(consumerWith({
        rules: [{
          ...rule,
          actions: [
            { field: 'a', action: 'set_fixed_value' },
            { field: 'b', action: 'set_value', value: '' },
            { field: 'c', action: 'extract_value' },
            { field: 'd', calculate: 'time_difference', params: { start_time: 'x' } },
            { action: 'set_fixed_value', value: 1 },
          ],
        }],
      }));

      expect(paths(result.errors)).toEqual([
        'consumers[0].rules[0].actions[0].value',
        'consumers[0].rules[0].actions[1].value',
        'consumers[0].rules[0].actions[2].query',
        'consumers[0].rules[0].actions[3].params.end_time',
        'consumers[0].rules[0].actions[4].field',
      ]);
    });

    it('warns about unknown strategies and duplicate rule ids', () => {
      const result = validator.validate(consumerWith({
        rules: [rule, { ...rule, actions: [{ field: 'x', action: 'teleport' }] }],
      }));

      expect(result.valid).toBe(true);
      expect(paths(result.warnings)).toEqual([
        'consumers[0].rules[1].actions[0].action',
        'consumers[0].rules[1].id_rule',
      ]);
    });
  });

  describe('queries', () => {
    function withQueries(querys: unknown): unknown {
      return consumerWith({ config: { db: { querys } } });
    }

    it('accepts keyed and array parameters', () => {
      const result = validator.validate(withQueries({
        save: {
          query: 'INSERT INTO {0} VALUES ({1})',
          params: {
            '0': { placeholder: 'entity_names', type: 'structural' },
            '1': { placeholder: '%s', requires: 'event_field', value: 'a.b' },
          },
        },
        find: {
          query: 'SELECT * FROM t WHERE a = {0}',
          params: [{ index: 0, placeholder: '%s', requires: 'context_value', value: 'session_id' }],
        },
      }));

      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('reports unknown kinds, empty text and index gaps', () => {
      const result = validator.validate(withQueries({
        delete: { query: 'DELETE', params: {} },
        save: {
          query: ' ',
          params: {
            '0': { placeholder: '%s', requires: 'event_field', value: 'a' },
            '2': { placeholder: '%s', requires: 'event_field', value: 'b' },
          },
        },
        find: { query: 'SELECT 1', params: {} },
      }));

      expect(result.errors.map((issue) => [issue.path, issue.message])).toEqual([
        [
          'consumers[0].config.db.querys.delete',
          'Unknown query kind: delete. Valid kinds: save, find, find_tidnid',
        ],
        ['consumers[0].config.db.querys.save.query', 'Query text must be a non-empty string'],
        [
          'consumers[0].config.db.querys.save.params',
          'Parameter indices must be contiguous from 0; missing index 1',
        ],
        ['consumers[0].config.db.querys.find.params', 'Query has no parameters'],
      ]);
    });

    it('checks parameter entries', () => {
      const result = validator.validate(withQueries({
        save: {
          query: 'INSERT',
          params: {
            '0': { placeholder: 'columns', type: 'structural' },
            '1': { placeholder: '%s' },
            '2': { placeholder: '%s', requires: 'teleport' },
            '3': { placeholder: '%s', type: 'bogus' },
          },
        },
      }));

      expect(paths(result.errors)).toEqual([
        'consumers[0].config.db.querys.save.params.1.requires',
        'consumers[0].config.db.querys.save.params.3.type',
      ]);
      expect(paths(result.warnings)).toEqual([
        'consumers[0].config.db.querys.save.params.0.placeholder',
        'consumers[0].config.db.querys.save.params.2.requires',
      ]);
    });
  });

  it('validates a single consumer document', () => {
    const result = validator.validateConsumer({ id: 'C1', rules: 'none' });

    expect(result.errors).toEqual([{ path: 'rules', message: 'Rules must be an array', severity: 'error' }]);
  });
});
