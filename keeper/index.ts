/**
 * dLOOP Flash Sizer
 *
 * ============================================================
 * WHAT THIS PACKAGE DOES:
 * ============================================================
 * - Sizes flash-loan-funded operations against a leveraged dLOOP vault
 * - Decides whether an operation is worth executing, net of flash fee,
 *   swap cost and treasury fee
 * - Runs that decision on a polling loop with injected collaborators
 *
 * ============================================================
 * WHAT THIS PACKAGE DOES NOT DO:
 * ============================================================
 * - Does NOT read the chain (plug in a SnapshotSource)
 * - Does NOT build or send transactions (plug in a submit callback)
 * - Does NOT talk to swap venues (plug in a SwapVenue)
 *
 * Flow:
 * 1. SnapshotSource reads position, leverage config and oracle prices
 * 2. evaluate() sizes the swap and the flash principal
 * 3. REJECT → notify and wait for the next cycle
 * 4. PROCEED → quote the venue, check it against the oracle ceiling
 * 5. submit() runs the flash loan; the result is validated and the
 *    surplus reported
 * ============================================================
 */

// Config
export type {
  Asset,
  FeePolicy,
  LeverageConfig,
  LeverageOperation,
  MarginLegs,
  ProceedDecision,
  RejectDecision,
  RejectReason,
  RewardClaim,
  RuntimeConfig,
  SizingBreakdown,
  SizingDecision,
  SwapBounds,
  SwapRequest,
  SwapResult,
  SwapValidation,
  SwapValidationError,
  VaultPosition,
} from './config/types.js';
export {
  DEFAULT_FLASH_FEE_BPS,
  DEFAULT_MIN_PROFIT_BPS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_SLIPPAGE_BPS,
  DEFAULT_TREASURY_FEE_BPS,
  MAX_RETRIES,
  POLICY_BOUNDS,
  RETRY_DELAY_MS,
} from './config/defaults.js';
export {
  ENV_KEYS,
  formatRuntimeConfig,
  loadRuntimeConfig,
  parseRuntimeConfig,
  validateRuntimeConfig,
} from './config/env.js';

// Math
export { assertUint256, ceilDiv, mulDiv, percentMul, rayDiv, rayMul, scaleDecimals, wadDiv, wadMul } from './math/fixedPoint.js';

// Oracle
export {
  assertSlippage,
  convert,
  isSameAsset,
  valueInBase,
  withSlippageBuffer,
  withSlippageDiscount,
} from './oracle/priceConverter.js';

// dLOOP
export {
  collateralToRemoveForRedeem,
  currentLeverageBps,
  currentSubsidyBps,
  isWithinBounds,
  leveragedDepositAmount,
  rebalanceToTarget,
  redeemLegs,
  validateLeverageConfig,
  type RebalancePlan,
  type RedeemLegs,
} from './dloop/leverage.js';

// Swap
export {
  maxInputForExactOutput,
  minOutputForExactInput,
  sizeSwap,
  validateExactInputResult,
  validateSwapRequest,
  validateSwapResult,
} from './swap/sizer.js';
export { checkQuote, type ExactOutputParams, type QuoteCheck, type SwapQuote, type SwapVenue } from './swap/venue.js';

// Engine
export { evaluate, evaluateMargin, validateFeePolicy } from './engine/profitability.js';

// Notify
export {
  LogNotifier,
  type ErrorNotice,
  type Notifier,
  type RejectNotice,
  type SuccessNotice,
} from './notify/notifier.js';

// Loop
export * from './loop/index.js';

// Utils
export {
  SizingError,
  describeError,
  isRetryable,
  isSizingError,
  type SizingErrorCategory,
  type SizingErrorCode,
} from './utils/errors.js';
export { createLogger, logger, type ModuleLogger } from './utils/logger.js';
export {
  BPS_DENOMINATOR,
  MAX_UINT256,
  PRICE_DECIMALS,
  formatAmount,
  formatBps,
  formatLeverage,
  formatPrice,
} from './utils/units.js';
