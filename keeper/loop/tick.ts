/**
 * Keeper Tick - Single Sizing Cycle
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Executes ONE complete cycle: snapshot → evaluate → quote → submit
 * - Retries read failures and snapshot-dependent SizingErrors (missing
 *   price, stale deadline, unhealthy position) with a fresh snapshot,
 *   up to maxRetries; bad policy fails at once
 * - Never retries a rejection: "no" is an answer
 * - Checks the venue quote against the oracle ceiling before submitting
 * - Validates what the transaction actually did and reports the surplus
 *
 * ============================================================
 * WHAT THIS MODULE DOES NOT DO:
 * ============================================================
 * - Does NOT manage timing between cycles (see runner.ts)
 * - Does NOT build or send transactions (the submit callback does,
 *   running the venue swap through executeSwap inside them)
 * - Does NOT retry a failed submit: the chain may already have moved
 * - Does NOT move surplus anywhere
 *
 * Think of this as: "Is there a profitable operation right now?"
 * ============================================================
 */

import type {
  Asset,
  FeePolicy,
  LeverageConfig,
  LeverageOperation,
  ProceedDecision,
  RejectReason,
  RuntimeConfig,
  SizingDecision,
  SwapRequest,
  SwapResult,
  VaultPosition,
} from '../config/types.js';
import { evaluate } from '../engine/profitability.js';
import { validateSwapResult } from '../swap/sizer.js';
import { checkQuote, type ExactOutputParams, type SwapQuote, type SwapVenue } from '../swap/venue.js';
import type { Notifier } from '../notify/notifier.js';
import { describeError, isRetryable, isSizingError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { formatAmount, formatLeverage } from '../utils/units.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Everything the engine needs, read fresh for every attempt
 */
export interface MarketSnapshot {
  position: VaultPosition;
  config: LeverageConfig;
  /** Flash asset, spent on the swap */
  inputAsset: Asset;
  /** Vault collateral, bought by the swap */
  outputAsset: Asset;
  /** Unlevered collateral the operation targets */
  equity: bigint;
  /** Unix seconds after which the prices are stale */
  deadline?: number;
  /** Own collateral, rewards and clock for the operation */
  operation?: LeverageOperation;
}

/**
 * Reads vault state and oracle prices (chain reader, indexer, fake)
 */
export interface SnapshotSource {
  read(): Promise<MarketSnapshot>;
}

export interface SubmitParams {
  decision: ProceedDecision;
  swap: ExactOutputParams;
  quote: SwapQuote;
  /** Runs the accepted quote on the venue (venue.executeExactOutput) */
  executeSwap: () => Promise<SwapResult>;
}

export interface SubmitReceipt {
  /** What the swap inside the transaction spent and delivered */
  result: SwapResult;
  /** Transaction hash or any other reference for ops */
  reference?: string;
}

/**
 * Sends the flash-loan transaction and reports what happened
 */
export type SubmitFn = (params: SubmitParams) => Promise<SubmitReceipt>;

/**
 * Context required to run a tick
 */
export interface TickContext {
  source: SnapshotSource;
  venue: SwapVenue;
  notifier: Notifier;
  runtime: RuntimeConfig;
  /** Dry run when omitted: evaluate and quote, never submit */
  submit?: SubmitFn;
  /** Unix seconds; defaults to the wall clock */
  now?: () => number;
}

export type TickOutcome =
  | 'executed'
  | 'dry_run'
  | 'rejected'
  | 'no_quote'
  | 'quote_rejected'
  | 'failed';

/**
 * Result of a tick execution
 */
export interface TickResult {
  outcome: TickOutcome;
  /** Evaluation attempts made (1 when the first one answered) */
  attempts: number;
  decision?: SizingDecision;
  rejectReason?: RejectReason;
  /** Output delivered beyond the requirement, after a successful submit */
  surplus?: bigint;
  /** Failure description for 'failed', 'no_quote' and 'quote_rejected' */
  error?: string;
}

// ============================================================
// HELPER FUNCTIONS
// ============================================================

function feePolicyFrom(runtime: RuntimeConfig): FeePolicy {
  return {
    flashFeeBps: runtime.flashFeeBps,
    protocolFeeBps: runtime.treasuryFeeBps,
    minProfitBps: runtime.minProfitBps,
    acceptBreakEven: runtime.acceptBreakEven,
  };
}

function requestFrom(snapshot: MarketSnapshot, runtime: RuntimeConfig): SwapRequest {
  return {
    inputAsset: snapshot.inputAsset,
    outputAsset: snapshot.outputAsset,
    amountOut: snapshot.equity,
    slippageBps: runtime.slippageBps,
    deadline: snapshot.deadline,
  };
}

function wallClockSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

interface Evaluated {
  snapshot: MarketSnapshot;
  decision: SizingDecision;
}

/**
 * Read a snapshot and evaluate it, retrying failures a fresh snapshot
 * can clear
 *
 * Returns the error at once when it is not retryable, the last one when
 * every attempt failed.
 */
async function evaluateWithRetry(
  ctx: TickContext
): Promise<{ evaluated: Evaluated; attempts: number } | { error: unknown; attempts: number }> {
  const { source, runtime } = ctx;
  const fees = feePolicyFrom(runtime);
  const now = ctx.now ?? wallClockSeconds;
  const maxAttempts = runtime.maxRetries + 1;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const snapshot = await source.read();
      const operation: LeverageOperation = { ...snapshot.operation, now: snapshot.operation?.now ?? now() };
      const decision = evaluate(snapshot.position, snapshot.config, requestFrom(snapshot, runtime), fees, operation);
      return { evaluated: { snapshot, decision }, attempts: attempt };
    } catch (error) {
      lastError = error;
      const retryable = isRetryable(error);
      logger.keeper.warn('Evaluation attempt failed', {
        attempt,
        maxAttempts,
        code: isSizingError(error) ? error.code : undefined,
        retryable,
        error: describeError(error),
      });

      if (!retryable) {
        return { error, attempts: attempt };
      }

      if (attempt < maxAttempts) {
        await sleep(runtime.retryDelayMs);
      }
    }
  }

  return { error: lastError, attempts: maxAttempts };
}

// ============================================================
// TICK
// ============================================================

/**
 * Run one sizing cycle
 *
 * Failures inside the cycle are reported through the notifier and the
 * result; only a failing notifier makes this throw.
 */
export async function tick(ctx: TickContext): Promise<TickResult> {
  const { venue, notifier, submit } = ctx;

  // ============================================================
  // STEP 1: Snapshot + evaluate (retried)
  // ============================================================
  const evaluation = await evaluateWithRetry(ctx);

  if ('error' in evaluation) {
    const { error, attempts } = evaluation;
    const message = describeError(error);
    logger.keeper.error('Cycle failed after retries', { attempts, error: message });
    await notifier.notifyError({
      stage: 'evaluate',
      message,
      code: isSizingError(error) ? error.code : undefined,
      attempts,
    });
    return { outcome: 'failed', attempts, error: message };
  }

  const { evaluated, attempts } = evaluation;
  const { snapshot, decision } = evaluated;

  // ============================================================
  // STEP 2: Business rejection - report and stop
  // ============================================================
  if (decision.action === 'reject') {
    logger.keeper.info('Operation rejected', {
      reason: decision.reason,
      leverage:
        decision.breakdown.currentLeverageBps !== undefined
          ? formatLeverage(decision.breakdown.currentLeverageBps)
          : undefined,
      netProfit: decision.breakdown.netProfit,
    });
    await notifier.notifyReject({ reason: decision.reason, breakdown: decision.breakdown });
    return { outcome: 'rejected', attempts, decision, rejectReason: decision.reason };
  }

  const { inputAsset, outputAsset } = snapshot;
  const amountOut = decision.breakdown.swapOutput;
  if (amountOut === undefined) {
    const message = 'proceed decision carries no swap output';
    logger.keeper.error(message);
    await notifier.notifyError({ stage: 'evaluate', message, attempts });
    return { outcome: 'failed', attempts, decision, error: message };
  }

  logger.keeper.info('Operation profitable', {
    flashPrincipal: formatAmount(decision.flashPrincipal, inputAsset.decimals),
    expectedNetProfit: formatAmount(decision.expectedNetProfit, inputAsset.decimals),
    swapOutput: formatAmount(amountOut, outputAsset.decimals),
  });

  const swap: ExactOutputParams = {
    inputAsset,
    outputAsset,
    amountOut,
    maxAmountIn: decision.maxSwapInput,
  };

  // ============================================================
  // STEP 3: Venue quote, checked against the oracle ceiling
  // ============================================================
  let quote: SwapQuote | null;
  try {
    quote = await venue.quoteExactOutput(swap);
  } catch (error) {
    const message = describeError(error);
    logger.keeper.warn('Venue quote failed', { venue: venue.name, error: message });
    await notifier.notifyError({ stage: 'quote', message, attempts });
    return { outcome: 'no_quote', attempts, decision, error: message };
  }

  if (!quote) {
    logger.keeper.warn('Venue has no route', { venue: venue.name });
    return { outcome: 'no_quote', attempts, decision, error: `${venue.name} returned no route` };
  }

  const check = checkQuote(quote, swap);
  if (!check.ok) {
    const message = `${venue.name} quote ${check.reason}`;
    logger.keeper.warn('Quote outside oracle bound', {
      venue: venue.name,
      reason: check.reason,
      quotedIn: quote.amountIn,
      maxAmountIn: swap.maxAmountIn,
      quotedOut: quote.amountOut,
      amountOut: swap.amountOut,
    });
    await notifier.notifyError({ stage: 'quote', message, attempts });
    return { outcome: 'quote_rejected', attempts, decision, error: message };
  }

  logger.keeper.debug('Quote accepted', { venue: venue.name, headroom: check.headroom });

  // ============================================================
  // STEP 4: Submit (skipped in dry-run mode)
  // ============================================================
  if (!submit) {
    logger.keeper.info('Dry run - not submitting', { venue: venue.name });
    return { outcome: 'dry_run', attempts, decision };
  }

  let receipt: SubmitReceipt;
  try {
    const accepted = quote;
    receipt = await submit({
      decision,
      swap,
      quote: accepted,
      executeSwap: () => venue.executeExactOutput(swap, accepted),
    });
  } catch (error) {
    const message = describeError(error);
    logger.keeper.error('Submit failed', { error: message });
    await notifier.notifyError({ stage: 'submit', message, attempts });
    return { outcome: 'failed', attempts, decision, error: message };
  }

  // ============================================================
  // STEP 5: Validate what actually happened
  // ============================================================
  const validation = validateSwapResult(receipt.result, swap.amountOut, swap.maxAmountIn);
  if (!validation.ok) {
    const { error } = validation;
    const message =
      error.code === 'InsufficientOutput'
        ? `received ${error.actual}, expected at least ${error.expected}`
        : `spent ${error.actual}, allowed at most ${error.max}`;
    logger.keeper.error('Swap result out of bounds', { code: error.code, reference: receipt.reference, message });
    await notifier.notifyError({ stage: 'validate', message, code: error.code, attempts });
    return { outcome: 'failed', attempts, decision, error: message };
  }

  logger.keeper.info('Operation executed', {
    reference: receipt.reference,
    spent: receipt.result.amountSpent,
    received: receipt.result.amountReceived,
    surplus: validation.surplus,
  });

  await notifier.notifySuccess({
    flashPrincipal: decision.flashPrincipal,
    expectedNetProfit: decision.expectedNetProfit,
    surplus: validation.surplus,
    reference: receipt.reference,
  });

  return { outcome: 'executed', attempts, decision, surplus: validation.surplus };
}
