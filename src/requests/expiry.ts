import { ValidationError } from '../errors';
import type { Expiry, ExpiryUnit } from '../types';

const UNIT_SUFFIX: Record<ExpiryUnit, string> = {
  minute: 'm',
  hour: 'h',
  day: 'd',
};

/**
 * Render an expiry in the server's `<amount><m|h|d>` notation.
 *
 * Strings are passed through as given.
 *
 * @throws {ValidationError} If an `ExpirySpec` has a non-positive or fractional amount, or an unknown unit
 */
export function formatExpiry(expiry: Expiry, field: string): string {
  if (typeof expiry === 'string') {
    return expiry;
  }

  if (!Number.isSafeInteger(expiry.amount) || expiry.amount <= 0) {
    throw new ValidationError(`${field} amount must be a positive integer`, field);
  }

  const suffix = Object.prototype.hasOwnProperty.call(UNIT_SUFFIX, expiry.unit)
    ? UNIT_SUFFIX[expiry.unit]
    : undefined;
  if (suffix === undefined) {
    throw new ValidationError(`${field} unit must be one of minute, hour, day`, field);
  }

  return `${expiry.amount}${suffix}`;
}
