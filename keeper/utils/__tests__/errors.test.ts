import { describe, expect, it } from 'vitest';
import { SizingError, describeError, isRetryable } from '../errors.js';

describe('SizingError', () => {
  it('prefixes the code and picks the category from it', () => {
    const error = new SizingError('DivisionByZero', 'denominator is zero');
    expect(error.message).toBe('DivisionByZero: denominator is zero');
    expect(error.category).toBe('arithmetic');
    expect(new SizingError('ZeroPrice', 'no oracle price for dUSD').category).toBe('input');
  });
});

describe('isRetryable', () => {
  it('retries read failures and snapshot-dependent codes', () => {
    expect(isRetryable(new Error('rpc unavailable'))).toBe(true);
    expect(isRetryable(new SizingError('ZeroPrice', 'no oracle price for dUSD'))).toBe(true);
    expect(isRetryable(new SizingError('QuoteExpired', 'quote deadline has passed'))).toBe(true);
    expect(isRetryable(new SizingError('Undercollateralized', 'debt must be below collateral'))).toBe(true);
  });

  it('fails fast on bad policy', () => {
    expect(isRetryable(new SizingError('InvalidFee', 'flashFeeBps must be in [0, 10000)'))).toBe(false);
    expect(isRetryable(new SizingError('InvalidSwapRequest', 'evaluate sizes exact-output swaps only'))).toBe(false);
    expect(isRetryable(new SizingError('InvalidLeverageConfig', 'expected 10000 <= lower <= target <= upper'))).toBe(
      false
    );
    expect(isRetryable(new SizingError('InvalidSlippage', 'slippage out of range'))).toBe(false);
  });
});

describe('describeError', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
