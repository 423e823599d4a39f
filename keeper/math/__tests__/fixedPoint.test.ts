import { describe, expect, it } from 'vitest';
import {
  assertUint256,
  ceilDiv,
  mulDiv,
  percentMul,
  rayDiv,
  rayMul,
  scaleDecimals,
  wadDiv,
  wadMul,
} from '../fixedPoint.js';
import { MAX_UINT256, RAY, WAD } from '../../utils/units.js';

describe('ceilDiv', () => {
  it('rounds a remainder up', () => {
    expect(ceilDiv(7n, 2n)).toBe(4n);
    expect(ceilDiv(6n, 2n)).toBe(3n);
    expect(ceilDiv(0n, 5n)).toBe(0n);
  });

  it('refuses a zero denominator', () => {
    expect(() => ceilDiv(1n, 0n)).toThrow('DivisionByZero:');
  });
});

describe('mulDiv', () => {
  it('floors or ceils a single division', () => {
    expect(mulDiv(10n, 3n, 4n, false)).toBe(7n);
    expect(mulDiv(10n, 3n, 4n, true)).toBe(8n);
    expect(mulDiv(10n, 2n, 4n, true)).toBe(5n);
  });

  it('rounds up by at most one, and only when inexact', () => {
    const cases: Array<[bigint, bigint, bigint]> = [
      [1n, 1n, 3n],
      [295n * WAD, 9n, 10_000n],
      [123_456_789n, 987_654_321n, 1_000_003n],
      [WAD, WAD, WAD],
      [0n, 17n, 5n],
    ];
    for (const [a, b, d] of cases) {
      const down = mulDiv(a, b, d, false);
      const up = mulDiv(a, b, d, true);
      const exact = (a * b) % d === 0n;
      expect(up - down).toBe(exact ? 0n : 1n);
    }
  });

  it('keeps the full intermediate product', () => {
    expect(mulDiv(MAX_UINT256, MAX_UINT256, MAX_UINT256, false)).toBe(MAX_UINT256);
  });

  it('throws when the result does not fit a uint256', () => {
    expect(() => mulDiv(MAX_UINT256, 2n, 1n, false)).toThrow('ArithmeticOverflow:');
  });

  it('rejects negative operands and a zero denominator', () => {
    expect(() => mulDiv(-1n, 1n, 1n, false)).toThrow('InvalidAmount:');
    expect(() => mulDiv(1n, 1n, 0n, false)).toThrow('DivisionByZero:');
  });
});

describe('assertUint256', () => {
  it('accepts the full range', () => {
    expect(() => assertUint256(0n, 'x')).not.toThrow();
    expect(() => assertUint256(MAX_UINT256, 'x')).not.toThrow();
    expect(() => assertUint256(MAX_UINT256 + 1n, 'x')).toThrow('ArithmeticOverflow:');
  });
});

describe('scaleDecimals', () => {
  it('scales up exactly', () => {
    expect(scaleDecimals(1_500_000n, 6, 18)).toBe(1_500_000_000_000_000_000n);
  });

  it('scales down with the chosen rounding', () => {
    expect(scaleDecimals(1_234_567n, 6, 2)).toBe(123n);
    expect(scaleDecimals(1_234_567n, 6, 2, true)).toBe(124n);
    expect(scaleDecimals(1_230_000n, 6, 2, true)).toBe(123n);
  });

  it('rejects decimals outside uint8', () => {
    expect(() => scaleDecimals(1n, 0, 256)).toThrow('InvalidDecimals:');
    expect(() => scaleDecimals(1n, 1.5, 6)).toThrow('InvalidDecimals:');
  });
});

describe('percentMul / wad / ray', () => {
  it('applies basis points with explicit rounding', () => {
    expect(percentMul(1_000n, 9n, true)).toBe(1n);
    expect(percentMul(1_000n, 9n, false)).toBe(0n);
    expect(percentMul(295n * WAD, 9n, true)).toBe(265_500_000_000_000_000n);
  });

  it('multiplies wads', () => {
    expect(wadMul(2n * WAD, 3n * WAD, false)).toBe(6n * WAD);
  });

  it('divides wads', () => {
    expect(wadDiv(6n * WAD, 3n * WAD, false)).toBe(2n * WAD);
    expect(wadDiv(1n, 3n, false)).toBe(333_333_333_333_333_333n);
    expect(wadDiv(1n, 3n, true)).toBe(333_333_333_333_333_334n);
  });

  it('multiplies rays', () => {
    expect(rayMul(RAY, 5n, false)).toBe(5n);
    expect(rayMul(1n, 1n, false)).toBe(0n);
    expect(rayMul(1n, 1n, true)).toBe(1n);
  });

  it('divides rays', () => {
    expect(rayDiv(1n, 3n, false)).toBe(333_333_333_333_333_333_333_333_333n);
    expect(rayDiv(1n, 3n, true)).toBe(333_333_333_333_333_333_333_333_334n);
  });
});
