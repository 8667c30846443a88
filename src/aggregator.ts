/**
 * Run statistics
 *
 * Counters are updated synchronously, with no await between read and
 * write, so workers sharing the event loop never lose an increment.
 */

import type { Stats, VerificationResult, VerificationStatus } from './types';
import { VERIFICATION_STATUSES } from './types';

const INVALID_STATUSES: ReadonlySet<VerificationStatus> = new Set<VerificationStatus>([
  'invalid_syntax',
  'no_mx_record',
  'mailbox_rejected',
]);

const INCONCLUSIVE_STATUSES: ReadonlySet<VerificationStatus> = new Set<VerificationStatus>([
  'ambiguous',
  'timeout',
  'api_error',
  'unknown',
]);

function emptyCounts(): Record<VerificationStatus, number> {
  return {
    valid: 0,
    invalid_syntax: 0,
    no_mx_record: 0,
    mailbox_rejected: 0,
    ambiguous: 0,
    timeout: 0,
    api_error: 0,
    unknown: 0,
  };
}

/**
 * Percentage of `part` in `total`, rounded to two decimals (0 for an empty run)
 */
export function percentage(part: number, total: number): number {
  return total === 0 ? 0 : Math.round((part / total) * 10000) / 100;
}

/**
 * Folds results into per-status counts
 *
 * @example
 * ```ts
 * const aggregator = new ResultAggregator();
 * aggregator.record({ status: 'valid' });
 * aggregator.record({ status: 'mailbox_rejected' }, 2);
 * aggregator.snapshot().successRate; // 33.33
 * ```
 */
export class ResultAggregator {
  private readonly counts = emptyCounts();
  private total = 0;

  /**
   * Records one result
   *
   * @param result - The result (only its status is read)
   * @param occurrences - How many input candidates the result stands for
   */
  record(result: Pick<VerificationResult, 'status'>, occurrences = 1): void {
    if (!Number.isInteger(occurrences) || occurrences < 1) {
      throw new RangeError(`occurrences must be a positive integer, got ${occurrences}`);
    }
    this.counts[result.status] += occurrences;
    this.total += occurrences;
  }

  /**
   * Returns a frozen copy of the current statistics
   */
  snapshot(): Stats {
    const counts = Object.freeze({ ...this.counts });
    let invalid = 0;
    let inconclusive = 0;

    for (const status of VERIFICATION_STATUSES) {
      if (INVALID_STATUSES.has(status)) invalid += counts[status];
      if (INCONCLUSIVE_STATUSES.has(status)) inconclusive += counts[status];
    }

    return Object.freeze({
      total: this.total,
      counts,
      valid: counts.valid,
      invalid,
      inconclusive,
      successRate: percentage(counts.valid, this.total),
    });
  }
}

/**
 * Computes statistics for a finished list of results
 */
export function summarize(results: readonly Pick<VerificationResult, 'status'>[]): Stats {
  const aggregator = new ResultAggregator();
  for (const result of results) {
    aggregator.record(result);
  }
  return aggregator.snapshot();
}
