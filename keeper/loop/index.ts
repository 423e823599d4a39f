/**
 * Loop module exports
 */

export {
  tick,
  type MarketSnapshot,
  type SnapshotSource,
  type SubmitFn,
  type SubmitParams,
  type SubmitReceipt,
  type TickContext,
  type TickOutcome,
  type TickResult,
} from './tick.js';
export { runForever, requestShutdown, isShutdownRequested, type RunnerConfig, type RunnerStats } from './runner.js';
