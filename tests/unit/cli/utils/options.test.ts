import { describe, it, expect } from 'vitest';
import {
  booleanOption,
  formatOption,
  integerOption,
  stringOption,
} from '../../../../src/cli/utils/options.js';
import { InvalidArgumentsError } from '../../../../src/cli/utils/errors.js';

describe('stringOption', () => {
  it('returns strings and stringified numbers', () => {
    expect(stringOption({ config: 'rules.yaml' }, 'config')).toBe('rules.yaml');
    expect(stringOption({ host: 8080 }, 'host')).toBe('8080');
    expect(stringOption({}, 'config')).toBeUndefined();
  });

  it('rejects flags given without a value', () => {
    expect(() => stringOption({ config: true }, 'config')).toThrow('Option --config expects a value');
  });
});

describe('booleanOption', () => {
  it('falls back when the option is not a boolean', () => {
    expect(booleanOption({ strict: true }, 'strict', false)).toBe(true);
    expect(booleanOption({ strict: 'yes' }, 'strict', false)).toBe(false);
    expect(booleanOption({}, 'color', true)).toBe(true);
  });
});

describe('integerOption', () => {
  it('parses numbers and numeric strings', () => {
    expect(integerOption({ port: 3000 }, 'port')).toBe(3000);
    expect(integerOption({ port: '8080' }, 'port')).toBe(8080);
    expect(integerOption({}, 'port')).toBeUndefined();
  });

  it('rejects negative and fractional values', () => {
    expect(() => integerOption({ port: -1 }, 'port')).toThrow('Option --port expects a non-negative integer');
    expect(() => integerOption({ port: '1.5' }, 'port')).toThrow(InvalidArgumentsError);
    expect(() => integerOption({ port: 'abc' }, 'port')).toThrow(InvalidArgumentsError);
  });
});

describe('formatOption', () => {
  it('accepts the known formats', () => {
    expect(formatOption({ format: 'json' })).toBe('json');
    expect(formatOption({ format: 'pretty' })).toBe('pretty');
    expect(formatOption({})).toBeUndefined();
  });

  it('rejects unknown formats', () => {
    expect(() => formatOption({ format: 'table' })).toThrow('Unknown format: table. Use one of: json, pretty');
  });
});
