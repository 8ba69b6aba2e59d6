import { describe, it, expect } from 'vitest';
import { boolean } from '../../src/boolean.js';

describe('boolean', () => {
  it.each(['true', 'Yes', ' ON ', '1'])('should parse %j as true', (raw) => {
    expect(boolean().parse(raw)).toEqual({ ok: true, value: true });
  });

  it.each(['false', 'NO', 'off', '0'])('should parse %j as false', (raw) => {
    expect(boolean().parse(raw)).toEqual({ ok: true, value: false });
  });

  it('should treat blank input as required', () => {
    expect(boolean().parse('')).toEqual({ ok: false, error: { code: 'REQUIRED' } });
  });

  it('should reject other words', () => {
    expect(boolean().parse('maybe')).toEqual({ ok: false, error: { code: 'INVALID_FORMAT', requiredType: 'yes or no' } });
  });

  it('should format as true or false', () => {
    expect(boolean().format(true)).toBe('true');
    expect(boolean().format(false)).toBe('false');
  });
});
