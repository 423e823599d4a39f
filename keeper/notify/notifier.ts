/**
 * Ops notifications
 *
 * The keeper reports three things: an operation went through, an
 * operation was refused, or a cycle could not produce an answer. Where
 * they go (Slack, a pager, a log file) is the implementation's business.
 */

import type { RejectReason, SizingBreakdown } from '../config/types.js';
import { logger } from '../utils/logger.js';

export interface SuccessNotice {
  flashPrincipal: bigint;
  expectedNetProfit: bigint;
  /** Output delivered beyond what was required; reported, never moved */
  surplus: bigint;
  /** Transaction reference from the submit callback, when there is one */
  reference?: string;
}

export interface RejectNotice {
  reason: RejectReason;
  breakdown: SizingBreakdown;
}

export interface ErrorNotice {
  /** Where the cycle failed: snapshot, evaluate, quote, submit, validate */
  stage: string;
  message: string;
  /** Error code, when the failure was a SizingError */
  code?: string;
  attempts: number;
}

export interface Notifier {
  notifySuccess(notice: SuccessNotice): Promise<void>;
  notifyReject(notice: RejectNotice): Promise<void>;
  notifyError(notice: ErrorNotice): Promise<void>;
}

/**
 * Notifier that writes to the keeper log
 *
 * Default when nothing else is wired.
 */
export class LogNotifier implements Notifier {
  async notifySuccess(notice: SuccessNotice): Promise<void> {
    logger.notify.info('Operation succeeded', { ...notice });
  }

  async notifyReject(notice: RejectNotice): Promise<void> {
    logger.notify.info(`Operation rejected: ${notice.reason}`, { ...notice.breakdown });
  }

  async notifyError(notice: ErrorNotice): Promise<void> {
    logger.notify.error(`Cycle failed at ${notice.stage}`, { ...notice });
  }
}
