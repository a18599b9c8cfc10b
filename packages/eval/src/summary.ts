import { primaryFailure, sortByPrecedence } from '@benchkit/exec';
import { logger as defaultLogger, type AttemptRecord, type FailureReason, type Logger } from '@benchkit/shared';
import { readAttempts } from './ledger/attempt';

export interface FailureCount {
  reason: FailureReason;
  count: number;
}

export interface AttemptSummary {
  total: number;
  passed: number;
  failed: number;
  /** Most primary reason first */
  failures: FailureCount[];
  primary: FailureReason | null;
}

/**
 * Counts reasons, keyed in precedence order. Nulls are ignored.
 */
export function countFailures(
  reasons: Iterable<FailureReason | null | undefined>,
): Partial<Record<FailureReason, number>> {
  const counts: Partial<Record<FailureReason, number>> = {};
  for (const { reason, count } of tallyFailures(reasons)) {
    counts[reason] = count;
  }
  return counts;
}

function tallyFailures(reasons: Iterable<FailureReason | null | undefined>): FailureCount[] {
  const tally = new Map<FailureReason, number>();
  for (const reason of reasons) {
    if (reason) tally.set(reason, (tally.get(reason) ?? 0) + 1);
  }
  return sortByPrecedence(tally.keys()).map((reason) => ({ reason, count: tally.get(reason) ?? 0 }));
}

export function summarizeRecords(records: readonly AttemptRecord[]): AttemptSummary {
  const reasons = records.map((r) => r.result.failure_reason);
  const passed = records.filter((r) => r.result.passed).length;
  return {
    total: records.length,
    passed,
    failed: records.length - passed,
    failures: tallyFailures(reasons),
    primary: primaryFailure(reasons),
  };
}

export async function summarizeAttempts(path: string, log: Logger = defaultLogger): Promise<AttemptSummary> {
  return summarizeRecords(await readAttempts(path, log));
}

