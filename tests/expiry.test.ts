/**
 * Expiry formatting tests
 */

import { describe, it, expect } from 'vitest';
import { formatExpiry } from '../src/requests';
import { ValidationError } from '../src/errors';
import type { Expiry } from '../src/types';

describe('formatExpiry', () => {
  it('should render each unit with its suffix', () => {
    expect(formatExpiry({ amount: 30, unit: 'minute' }, 'expires')).toBe('30m');
    expect(formatExpiry({ amount: 2, unit: 'hour' }, 'expires')).toBe('2h');
    expect(formatExpiry({ amount: 1, unit: 'day' }, 'expires')).toBe('1d');
  });

  it('should pass raw strings through unchanged', () => {
    expect(formatExpiry('90m', 'expires')).toBe('90m');
  });

  it('should reject a zero amount', () => {
    expect(() => formatExpiry({ amount: 0, unit: 'hour' }, 'expires')).toThrow(
      new ValidationError('expires amount must be a positive integer', 'expires')
    );
  });

  it('should reject a fractional amount', () => {
    expect(() => formatExpiry({ amount: 1.5, unit: 'day' }, 'customExpiry')).toThrow(
      'customExpiry amount must be a positive integer'
    );
  });

  it('should reject an amount beyond the safe integer range', () => {
    expect(() => formatExpiry({ amount: 1e21, unit: 'day' }, 'expires')).toThrow(
      new ValidationError('expires amount must be a positive integer', 'expires')
    );
  });

  it('should reject an unknown unit', () => {
    const expiry: Expiry = JSON.parse('{"amount":1,"unit":"week"}');

    expect(() => formatExpiry(expiry, 'expires')).toThrow(
      'expires unit must be one of minute, hour, day'
    );
  });
});
