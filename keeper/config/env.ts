/**
 * Runtime configuration from the environment
 *
 * ============================================================
 * PARSING AND VALIDATION
 * ============================================================
 *
 * Converts raw environment strings into a typed RuntimeConfig.
 *
 * VALIDATION RULES:
 * - Every numeric value must be an integer inside POLICY_BOUNDS
 * - ACCEPT_BREAK_EVEN is only enabled by an exact "true"
 * - Anything else falls back to DEFAULT_RUNTIME_CONFIG with a warning
 *
 * parseRuntimeConfig takes the env map as an argument so tests never
 * touch process.env. loadRuntimeConfig is the only function that reads
 * .env from disk.
 * ============================================================
 */

import { config as loadDotenv } from 'dotenv';
import type { RuntimeConfig } from './types.js';
import { BOUNDED_KEYS, DEFAULT_RUNTIME_CONFIG, POLICY_BOUNDS, type BoundedKey } from './defaults.js';
import { logger } from '../utils/logger.js';

/**
 * Environment variable names
 */
export const ENV_KEYS = {
  SLIPPAGE_BPS: 'SLIPPAGE_BPS',
  MIN_PROFIT_BPS: 'MIN_PROFIT_BPS',
  FLASH_FEE_BPS: 'FLASH_FEE_BPS',
  TREASURY_FEE_BPS: 'TREASURY_FEE_BPS',
  ACCEPT_BREAK_EVEN: 'ACCEPT_BREAK_EVEN',
  POLL_INTERVAL_MS: 'POLL_INTERVAL_MS',
  MAX_RETRIES: 'MAX_RETRIES',
  RETRY_DELAY_MS: 'RETRY_DELAY_MS',
} as const;

export type RawEnv = Record<string, string | undefined>;

// ============================================================
// PARSING FUNCTIONS
// ============================================================

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value.trim().toLowerCase() === 'true';
}

/**
 * Parse a bounded integer, falling back to the default when the value is
 * missing, malformed or out of bounds
 */
function parseBoundedInt(key: BoundedKey, envName: string, value: string | undefined): number {
  const fallback = DEFAULT_RUNTIME_CONFIG[key];
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^-?\d+$/.test(trimmed) || !Number.isSafeInteger(parsed)) {
    logger.config.warn(`Invalid integer for ${envName}: ${value}, using fallback: ${fallback}`);
    return fallback;
  }

  const { min, max } = POLICY_BOUNDS[key];
  if (parsed < min || parsed > max) {
    logger.config.warn(`${envName}=${parsed} outside [${min}, ${max}], using fallback: ${fallback}`);
    return fallback;
  }

  return parsed;
}

/**
 * Build a RuntimeConfig from an environment map
 *
 * @param env - Variables to read (usually process.env)
 */
export function parseRuntimeConfig(env: RawEnv): RuntimeConfig {
  return {
    slippageBps: parseBoundedInt('slippageBps', ENV_KEYS.SLIPPAGE_BPS, env[ENV_KEYS.SLIPPAGE_BPS]),
    minProfitBps: parseBoundedInt('minProfitBps', ENV_KEYS.MIN_PROFIT_BPS, env[ENV_KEYS.MIN_PROFIT_BPS]),
    flashFeeBps: parseBoundedInt('flashFeeBps', ENV_KEYS.FLASH_FEE_BPS, env[ENV_KEYS.FLASH_FEE_BPS]),
    treasuryFeeBps: parseBoundedInt('treasuryFeeBps', ENV_KEYS.TREASURY_FEE_BPS, env[ENV_KEYS.TREASURY_FEE_BPS]),
    acceptBreakEven: parseBoolean(env[ENV_KEYS.ACCEPT_BREAK_EVEN], DEFAULT_RUNTIME_CONFIG.acceptBreakEven),
    pollIntervalMs: parseBoundedInt('pollIntervalMs', ENV_KEYS.POLL_INTERVAL_MS, env[ENV_KEYS.POLL_INTERVAL_MS]),
    maxRetries: parseBoundedInt('maxRetries', ENV_KEYS.MAX_RETRIES, env[ENV_KEYS.MAX_RETRIES]),
    retryDelayMs: parseBoundedInt('retryDelayMs', ENV_KEYS.RETRY_DELAY_MS, env[ENV_KEYS.RETRY_DELAY_MS]),
  };
}

// ============================================================
// VALIDATION
// ============================================================

/**
 * Check a RuntimeConfig built by hand (tests, embedding callers)
 *
 * @returns Violations, empty when the config is usable
 */
export function validateRuntimeConfig(runtime: RuntimeConfig): string[] {
  const errors: string[] = [];

  for (const key of BOUNDED_KEYS) {
    const value = runtime[key];
    const { min, max } = POLICY_BOUNDS[key];
    if (!Number.isInteger(value)) {
      errors.push(`${key} ${value} must be an integer`);
    } else if (value < min || value > max) {
      errors.push(`${key} ${value} out of bounds [${min}, ${max}]`);
    }
  }

  if (runtime.acceptBreakEven && runtime.minProfitBps > 0) {
    errors.push(`acceptBreakEven has no effect while minProfitBps (${runtime.minProfitBps}) is above 0`);
  }

  return errors;
}

/**
 * Load .env into process.env, then parse it
 */
export function loadRuntimeConfig(): RuntimeConfig {
  loadDotenv();
  const runtime = parseRuntimeConfig(process.env);

  logger.config.info('Runtime config loaded', { ...runtime });
  return runtime;
}

/**
 * One-line policy summary for startup logs
 */
export function formatRuntimeConfig(runtime: RuntimeConfig): string {
  return [
    `slippage=${runtime.slippageBps}bps`,
    `minProfit=${runtime.minProfitBps}bps`,
    `flashFee=${runtime.flashFeeBps}bps`,
    `treasuryFee=${runtime.treasuryFeeBps}bps`,
    `breakEven=${runtime.acceptBreakEven}`,
    `poll=${runtime.pollIntervalMs}ms`,
    `retries=${runtime.maxRetries}x${runtime.retryDelayMs}ms`,
  ].join(' ');
}
