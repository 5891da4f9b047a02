import type { PreviewOutput, ValidateOutput } from '../../../../src/cli/types.js';

export const invalidValidation: ValidateOutput = {
  file: '/work/consumers.yaml',
  valid: false,
  consumerCount: 1,
  errorCount: 1,
  warningCount: 0,
  errors: [{ path: 'consumers[0].id', message: 'Consumer ID is required', severity: 'error' }],
  warnings: [],
};

export const preview: PreviewOutput = {
  file: 'event.json',
  entity: {
    entity_names: ['orders'],
    session_id: 'S1',
    tidnid: null,
    data: {
      id_service: 'SVC1',
      timestamp: null,
      service: { idService: 'SVC1' },
      rules: { tier: 'gold' },
    },
  },
  rules: [
    {
      ruleId: 'gold',
      priority: 10,
      withinValidity: true,
      applicable: true,
      conditions: [],
      actions: [
        {
          action: { field: 'tier', kind: 'set_fixed_value', value: 'gold' },
          success: true,
          output: { tier: 'gold' },
        },
      ],
    },
    {
      ruleId: 'late',
      priority: 1,
      withinValidity: false,
      applicable: false,
      conditions: [],
      actions: [],
    },
  ],
  queries: [
    { entityName: 'orders', kind: 'save', query: 'INSERT INTO orders (id) VALUES (%s)', params: ['S1'] },
  ],
};
