/**
 * Unit constants and display helpers
 *
 * Handles the decimal conventions shared with the on-chain contracts:
 * WAD (1e18) token math, RAY (1e27) rate math, 8-decimal oracle prices
 * and basis points.
 *
 * CRITICAL: Engine arithmetic is bigint only. The formatting helpers here
 * are for logs and notifications and must never feed back into sizing.
 */

import { MaxUint256, formatUnits } from 'ethers';

export const WAD = 10n ** 18n;
export const RAY = 10n ** 27n;

/** Oracle prices use 8 decimals (USD) like the Aave-style price getter */
export const PRICE_DECIMALS = 8;

/** 100% in basis points */
export const ONE_HUNDRED_PERCENT_BPS = 10_000;
export const BPS_DENOMINATOR = BigInt(ONE_HUNDRED_PERCENT_BPS);

/** Largest value a uint256 can hold; every engine amount must fit */
export const MAX_UINT256: bigint = MaxUint256;

/** Upper bound for an ERC20-style decimals value (uint8) */
export const MAX_DECIMALS = 255;

/**
 * Format a raw token amount for display
 *
 * Example: formatAmount(1500000n, 6) => "1.5"
 */
export function formatAmount(amount: bigint, decimals: number): string {
  return formatUnits(amount, decimals);
}

/**
 * Format an oracle price (8 decimals) for display
 */
export function formatPrice(price: bigint): string {
  return formatUnits(price, PRICE_DECIMALS);
}

/**
 * Format leverage in bps as a multiplier, two decimals
 *
 * Example: formatLeverage(30000n) => "3.00x"
 */
export function formatLeverage(bps: bigint): string {
  const whole = bps / BPS_DENOMINATOR;
  const hundredths = (bps % BPS_DENOMINATOR) / 100n;
  return `${whole}.${hundredths.toString().padStart(2, '0')}x`;
}

/**
 * Format basis points as a percentage string
 *
 * Example: formatBps(50) => "0.50%"
 */
export function formatBps(bps: number): string {
  return `${(bps / 100).toFixed(2)}%`;
}
