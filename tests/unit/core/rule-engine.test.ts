import { describe, it, expect } from 'vitest';
import { RuleEngine } from '../../../src/core/rule-engine.js';
import { buildRegistry } from '../../../src/strategies/registry.js';
import type { Rule } from '../../../src/types/rule.js';
import type { JsonValue } from '../../../src/types/json.js';

const now = new Date('2024-06-01T12:00:00Z');

function writeRule(id: string, priority: number, value: JsonValue, extra: Partial<Rule> = {}): Rule {
  return {
    id,
    eventType: 'SVC1',
    priority,
    conditions: [],
    actions: [{ field: 'x', kind: 'set_fixed_value', value }],
    ...extra,
  };
}

const prioritised = [writeRule('p5', 5, 'five'), writeRule('p1', 1, 'one'), writeRule('p10', 10, 'ten')];

describe('RuleEngine', () => {
  it('orders rules by descending priority', () => {
    expect(new RuleEngine(prioritised).order).toEqual(['p10', 'p5', 'p1']);
  });

  it('keeps configuration order for equal priorities', () => {
    const engine = new RuleEngine([writeRule('a', 5, 'a'), writeRule('b', 5, 'b'), writeRule('c', 7, 'c')]);

    expect(engine.order).toEqual(['c', 'a', 'b']);
    expect(engine.processEvent({}, now)).toEqual({ x: 'b' });
  });

  it('lets the last applied rule win under overwrite', () => {
    const engine = new RuleEngine(prioritised, { registry: buildRegistry() });

    expect(engine.processEvent({}, now)).toEqual({ x: 'one' });
  });

  it('keeps the highest-priority value under first_wins', () => {
    const engine = new RuleEngine(prioritised, { registry: buildRegistry(), mergePolicy: 'first_wins' });

    expect(engine.processEvent({}, now)).toEqual({ x: 'ten' });
  });

  it('merges distinct fields from every applicable rule', () => {
    const engine = new RuleEngine([
      writeRule('a', 2, 1),
      { ...writeRule('b', 1, 0), actions: [{ field: 'y', kind: 'set_value', value: 'order.id' }] },
    ]);

    expect(engine.processEvent({ order: { id: 'O-7' } }, now)).toEqual({ x: 1, y: 'O-7' });
  });

  it('skips rules outside their validity period', () => {
    const engine = new RuleEngine([
      writeRule('expired', 3, 'old', { validityPeriod: { end: new Date('2024-01-01T00:00:00Z') } }),
      writeRule('future', 2, 'new', { validityPeriod: { start: new Date('2025-01-01T00:00:00Z') } }),
    ]);

    expect(engine.processEvent({}, now)).toEqual({});
    expect(engine.processEvent({}, new Date('2023-06-01T00:00:00Z'))).toEqual({ x: 'old' });
  });

  it('skips rules whose conditions fail', () => {
    const engine = new RuleEngine([
      writeRule('vip', 1, 'vip', {
        conditions: [{ operator: 'equals', field: 'customer.vip', value: true, requireExt: false }],
      }),
    ]);

    expect(engine.processEvent({ customer: { vip: false } }, now)).toEqual({});
    expect(engine.processEvent({ 'customer.vip': true }, now)).toEqual({ x: 'vip' });
  });

  it('passes the extensions to extract_value', () => {
    const engine = new RuleEngine([{
      id: 'region',
      eventType: 'SVC1',
      priority: 0,
      conditions: [{ operator: 'exists', field: 'order.country', requireExt: true, nameExt: 'countries' }],
      actions: [{ field: 'region', kind: 'extract_value', query: "[?code=='{0}'].region | [0]" }],
    }], {
      extensions: { countries: [{ code: 'PT', region: 'EU' }] },
    });

    expect(engine.processEvent({ order: { country: 'PT' } }, now)).toEqual({ region: 'EU' });
  });

  describe('evaluate', () => {
    it('reports validity, conditions and actions per rule', () => {
      const engine = new RuleEngine([
        writeRule('checked', 2, 'yes', {
          conditions: [{ operator: 'exists', field: 'order.id', requireExt: false }],
        }),
        writeRule('expired', 1, 'no', { validityPeriod: { end: new Date('2020-01-01T00:00:00Z') } }),
      ]);

      const [checked, expired] = engine.evaluate({ order: { id: 'O-1' } }, now);

      expect(checked).toEqual({
        ruleId: 'checked',
        priority: 2,
        withinValidity: true,
        applicable: true,
        conditions: [{
          conditionIndex: 0,
          field: 'order.id',
          operator: 'exists',
          actualValue: 'O-1',
          expectedValue: undefined,
          result: true,
        }],
        actions: [{
          action: { field: 'x', kind: 'set_fixed_value', value: 'yes' },
          success: true,
          output: { x: 'yes' },
        }],
      });
      expect(expired).toEqual({
        ruleId: 'expired',
        priority: 1,
        withinValidity: false,
        applicable: false,
        conditions: [],
        actions: [],
      });
    });
  });
});
