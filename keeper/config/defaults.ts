/**
 * Default policy values for the sizing keeper
 *
 * ============================================================
 * FALLBACK BEHAVIOR:
 * ============================================================
 * DEFAULT_RUNTIME_CONFIG is used when:
 * - A variable is missing from the environment
 * - A variable is not an integer
 * - A variable is outside POLICY_BOUNDS
 *
 * The keeper never refuses to start over a bad policy value. It falls
 * back to the default and logs a warning.
 * ============================================================
 */

import type { RuntimeConfig } from './types.js';

/** Slippage tolerance on the exact-output swap (0.50%) */
export const DEFAULT_SLIPPAGE_BPS = 50;

/** Minimum net profit relative to flash principal (0.10%) */
export const DEFAULT_MIN_PROFIT_BPS = 10;

/** Flash lender fee (0.09%, the common Aave-style premium) */
export const DEFAULT_FLASH_FEE_BPS = 9;

/** Treasury share of claimed rewards (5%) */
export const DEFAULT_TREASURY_FEE_BPS = 500;

export const DEFAULT_POLL_INTERVAL_MS = 30_000;

/** Attempts after the first one when a cycle hits a hard failure */
export const MAX_RETRIES = 3;

export const RETRY_DELAY_MS = 1_000;

/**
 * Runtime policy used when nothing is configured
 *
 * Break-even operations are refused unless explicitly accepted.
 */
export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  slippageBps: DEFAULT_SLIPPAGE_BPS,
  minProfitBps: DEFAULT_MIN_PROFIT_BPS,
  flashFeeBps: DEFAULT_FLASH_FEE_BPS,
  treasuryFeeBps: DEFAULT_TREASURY_FEE_BPS,
  acceptBreakEven: false,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  maxRetries: MAX_RETRIES,
  retryDelayMs: RETRY_DELAY_MS,
};

/**
 * Validation bounds for policy values
 *
 * Tighter than what the engine accepts: the engine takes any fee below
 * 100%, the keeper refuses to run with more than 10% slippage.
 */
export const POLICY_BOUNDS = {
  slippageBps: { min: 0, max: 1_000 },
  minProfitBps: { min: 0, max: 10_000 },
  flashFeeBps: { min: 0, max: 1_000 },
  treasuryFeeBps: { min: 0, max: 5_000 },
  pollIntervalMs: { min: 1_000, max: 3_600_000 }, // 1s to 1h
  maxRetries: { min: 0, max: 10 },
  retryDelayMs: { min: 0, max: 60_000 },
} as const;

export type BoundedKey = keyof typeof POLICY_BOUNDS;

export const BOUNDED_KEYS: readonly BoundedKey[] = [
  'slippageBps',
  'minProfitBps',
  'flashFeeBps',
  'treasuryFeeBps',
  'pollIntervalMs',
  'maxRetries',
  'retryDelayMs',
];
