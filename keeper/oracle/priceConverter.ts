/**
 * Oracle Price Conversion
 *
 * ============================================================
 * THE FORMULA:
 * ============================================================
 *
 *   amountTo = amountFrom × priceFrom × 10^decimalsTo
 *              ─────────────────────────────────────
 *                  priceTo × 10^decimalsFrom
 *
 * Computed with a single mulDiv so there is exactly one rounding step.
 * Both prices use the same oracle base (8-decimal USD).
 *
 * A zero price means the oracle has no answer. It is NEVER replaced by a
 * default: conversion fails with ZeroPrice.
 * ============================================================
 */

import { getAddress, isAddress } from 'ethers';
import type { Asset } from '../config/types.js';
import { SizingError } from '../utils/errors.js';
import { assertDecimals, mulDiv, percentMul } from '../math/fixedPoint.js';
import { ONE_HUNDRED_PERCENT_BPS } from '../utils/units.js';

/**
 * Whether two assets are the same token
 *
 * Addresses compare checksum-insensitively; other handles compare exactly.
 */
export function isSameAsset(a: Asset, b: Asset): boolean {
  if (a.id === b.id) return true;
  if (isAddress(a.id) && isAddress(b.id)) {
    return getAddress(a.id) === getAddress(b.id);
  }
  return false;
}

function assertPriced(asset: Asset): void {
  assertDecimals(asset.decimals, 'decimals');
  if (asset.price === 0n) {
    throw new SizingError('ZeroPrice', `no oracle price for ${asset.symbol ?? asset.id}`, {
      asset: asset.id,
    });
  }
}

/**
 * Convert an amount of one asset into the equivalent amount of another
 *
 * Identity conversion returns the amount untouched and never reads the
 * prices, so it works for assets the oracle does not price.
 */
export function convert(amount: bigint, fromAsset: Asset, toAsset: Asset, roundUp: boolean): bigint {
  if (isSameAsset(fromAsset, toAsset)) return amount;

  assertPriced(fromAsset);
  assertPriced(toAsset);

  const numeratorFactor = fromAsset.price * 10n ** BigInt(toAsset.decimals);
  const denominator = toAsset.price * 10n ** BigInt(fromAsset.decimals);

  return mulDiv(amount, numeratorFactor, denominator, roundUp);
}

/**
 * Value of an amount in oracle base currency (8 decimals)
 */
export function valueInBase(amount: bigint, asset: Asset, roundUp: boolean): bigint {
  assertPriced(asset);
  return mulDiv(amount, asset.price, 10n ** BigInt(asset.decimals), roundUp);
}

/**
 * Reject slippage outside [0, 10000)
 *
 * 100% or more slippage makes the bound meaningless.
 */
export function assertSlippage(slippageBps: number): void {
  if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps >= ONE_HUNDRED_PERCENT_BPS) {
    throw new SizingError('InvalidSlippage', `slippage must be an integer in [0, ${ONE_HUNDRED_PERCENT_BPS})`, {
      slippageBps,
    });
  }
}

/**
 * amount × (10000 + slippage) / 10000, rounded up
 *
 * Used for the maximum the caller is willing to spend.
 */
export function withSlippageBuffer(amount: bigint, slippageBps: number): bigint {
  assertSlippage(slippageBps);
  return percentMul(amount, BigInt(ONE_HUNDRED_PERCENT_BPS + slippageBps), true);
}

/**
 * amount × (10000 - slippage) / 10000, rounded down
 *
 * Used for the minimum the caller is willing to receive.
 */
export function withSlippageDiscount(amount: bigint, slippageBps: number): bigint {
  assertSlippage(slippageBps);
  return percentMul(amount, BigInt(ONE_HUNDRED_PERCENT_BPS - slippageBps), false);
}
