/**
 * Keeper Runner - Polling Loop with Precise Timing
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Runs the keeper until shutdown is requested (or SIGINT/SIGTERM)
 * - Calls tick() every pollIntervalMs
 * - Ensures NO overlapping executions
 * - Subtracts tick duration from the sleep so the interval does not drift
 *
 * ============================================================
 * WHAT THIS MODULE DOES NOT DO:
 * ============================================================
 * - Does NOT contain sizing logic
 * - Does NOT use setInterval (a while loop keeps ticks sequential)
 * - Does NOT retry: tick() owns retries within a cycle
 * ============================================================
 */

import { tick, type TickContext, type TickResult } from './tick.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';

// ============================================================
// TYPES
// ============================================================

export interface RunnerConfig {
  /** Polling interval in milliseconds */
  pollIntervalMs: number;
  /** Collaborators and policy for every tick */
  tickContext: TickContext;
  /** Stop after this many ticks (unbounded when omitted) */
  maxTicks?: number;
}

/**
 * Runner statistics
 */
export interface RunnerStats {
  totalTicks: number;
  totalExecuted: number;
  totalRejected: number;
  /** Cycles that ended in failure, no quote or a refused quote */
  totalErrors: number;
  startedAt: Date;
}

/** Ticks between periodic stats lines */
const STATS_EVERY = 10;

// ============================================================
// SHUTDOWN HANDLING
// ============================================================

let shutdownRequested = false;

/**
 * Request graceful shutdown
 *
 * The runner finishes the current tick and then exits.
 */
export function requestShutdown(): void {
  shutdownRequested = true;
  logger.keeper.info('Shutdown requested - will exit after current tick');
}

export function isShutdownRequested(): boolean {
  return shutdownRequested;
}

function record(stats: RunnerStats, result: TickResult): void {
  stats.totalTicks++;
  switch (result.outcome) {
    case 'executed':
      stats.totalExecuted++;
      break;
    case 'rejected':
      stats.totalRejected++;
      break;
    case 'dry_run':
      break;
    default:
      stats.totalErrors++;
  }
}

// ============================================================
// RUNNER
// ============================================================

/**
 * Run the keeper loop
 *
 * A tick that throws (only a failing notifier can) is logged and the
 * loop carries on.
 *
 * @returns Final statistics once the loop stops
 */
export async function runForever(config: RunnerConfig): Promise<RunnerStats> {
  const { pollIntervalMs, tickContext, maxTicks } = config;
  shutdownRequested = false;

  const stats: RunnerStats = {
    totalTicks: 0,
    totalExecuted: 0,
    totalRejected: 0,
    totalErrors: 0,
    startedAt: new Date(),
  };

  logger.keeper.info('Runner started', {
    pollIntervalMs,
    venue: tickContext.venue.name,
    dryRun: tickContext.submit === undefined,
  });

  const onSigint = () => {
    logger.keeper.info('Received SIGINT');
    requestShutdown();
  };
  const onSigterm = () => {
    logger.keeper.info('Received SIGTERM');
    requestShutdown();
  };
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  try {
    while (!shutdownRequested) {
      const tickStart = Date.now();

      try {
        const result = await tick(tickContext);
        record(stats, result);

        if (stats.totalTicks % STATS_EVERY === 0) {
          const uptimeHours = ((Date.now() - stats.startedAt.getTime()) / (1000 * 60 * 60)).toFixed(2);
          logger.keeper.info('Runner stats', {
            ticks: stats.totalTicks,
            executed: stats.totalExecuted,
            rejected: stats.totalRejected,
            errors: stats.totalErrors,
            uptimeHours,
          });
        }
      } catch (error) {
        stats.totalTicks++;
        stats.totalErrors++;
        logger.keeper.error('Unexpected tick error', {
          error: error instanceof Error ? error.message : 'Unknown error',
          tick: stats.totalTicks,
        });
      }

      if (maxTicks !== undefined && stats.totalTicks >= maxTicks) {
        break;
      }

      const elapsed = Date.now() - tickStart;
      const sleepTime = pollIntervalMs - elapsed;

      if (sleepTime < 0) {
        logger.keeper.warn('Tick took longer than poll interval', {
          elapsed,
          interval: pollIntervalMs,
          overtime: -sleepTime,
        });
      }

      if (!shutdownRequested) {
        await sleep(sleepTime);
      }
    }
  } finally {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  }

  const uptimeMinutes = ((Date.now() - stats.startedAt.getTime()) / (1000 * 60)).toFixed(2);
  logger.keeper.info('Runner stopped gracefully', {
    totalTicks: stats.totalTicks,
    totalExecuted: stats.totalExecuted,
    totalRejected: stats.totalRejected,
    totalErrors: stats.totalErrors,
    uptimeMinutes,
  });

  return stats;
}
