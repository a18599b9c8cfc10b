import {
  FAILURE_REASONS,
  isInterrupt,
  isStage,
  UsageError,
  type FailureReason,
  type Stage,
  type ValidationErrorReason,
} from '@benchkit/shared';

/** Exit codes produced by a deadline kill (`timeout`) and by SIGKILL. */
export const TIMEOUT_EXIT_CODES: readonly number[] = [124, 137];

/**
 * Rank of each reason; lower is reported first when several apply.
 */
export const PRECEDENCE: Readonly<Record<FailureReason, number>> = {
  GIT_CLONE_FAILED: 1,
  GIT_CHECKOUT_FAILED: 2,
  SETUP_TIMEOUT: 3,
  SETUP_FAILED: 4,
  BASELINE_NOT_FAILING: 5,
  SANDBOX_ERROR: 6,
  LLM_ERROR: 7,
  TOOL_ERROR: 8,
  TIMEOUT: 9,
  AGENT_GAVE_UP: 10,
  TESTS_FAILED: 11,
  NO_TESTS_COLLECTED: 12,
  INTERNAL_ERROR: 13,
  INTERRUPTED: 14,
  UNKNOWN: 15,
};

const VALIDATION_ERROR_REASONS: Readonly<Record<FailureReason, ValidationErrorReason>> = {
  GIT_CLONE_FAILED: 'git_clone_failed',
  GIT_CHECKOUT_FAILED: 'git_checkout_failed',
  SETUP_TIMEOUT: 'setup_timeout',
  SETUP_FAILED: 'setup_failed',
  BASELINE_NOT_FAILING: 'baseline_passed',
  SANDBOX_ERROR: 'sandbox_error',
  LLM_ERROR: 'llm_error',
  TOOL_ERROR: 'tool_error',
  TIMEOUT: 'timeout',
  AGENT_GAVE_UP: 'agent_gave_up',
  TESTS_FAILED: 'tests_failed',
  NO_TESTS_COLLECTED: 'no_tests_collected',
  INTERNAL_ERROR: 'internal_error',
  INTERRUPTED: 'interrupted',
  UNKNOWN: 'unknown',
};

/**
 * Maps the exit code of a test runner to a failure reason, or null on success.
 */
export function fromTestExitCode(exitCode: number): FailureReason | null {
  switch (exitCode) {
    case 0:
      return null;
    case 1:
      return 'TESTS_FAILED';
    case 2:
      return 'INTERRUPTED';
    case 3:
    case 4:
      return 'INTERNAL_ERROR';
    case 5:
      return 'NO_TESTS_COLLECTED';
    case 124:
    case 137:
      return 'TIMEOUT';
    default:
      return 'UNKNOWN';
  }
}

/**
 * Classifies the outcome of a stage.
 *
 * A fault always wins, then a timeout exit code, then the stage's own rule.
 * For `baseline_run` a zero exit is the failure: the task's tests must fail
 * before any fix is applied.
 *
 * @returns the failure reason, or null when the stage succeeded
 * @throws UsageError for a stage name outside {@link Stage}
 */
export function classifyFailure(
  stage: Stage,
  exitCode: number,
  fault?: unknown,
): FailureReason | null {
  if (!isStage(stage)) {
    throw new UsageError(`Unknown stage: ${String(stage)}`);
  }

  if (fault !== undefined && fault !== null) {
    return isInterrupt(fault) ? 'INTERRUPTED' : 'UNKNOWN';
  }

  if (TIMEOUT_EXIT_CODES.includes(exitCode)) {
    return stage === 'setup' ? 'SETUP_TIMEOUT' : 'TIMEOUT';
  }

  switch (stage) {
    case 'git_clone':
      return exitCode !== 0 ? 'GIT_CLONE_FAILED' : null;
    case 'git_checkout':
      return exitCode !== 0 ? 'GIT_CHECKOUT_FAILED' : null;
    case 'setup':
      return exitCode !== 0 ? 'SETUP_FAILED' : null;
    case 'baseline_run':
      return exitCode === 0 ? 'BASELINE_NOT_FAILING' : null;
    case 'agent_run':
    case 'final_test':
      return fromTestExitCode(exitCode);
    default:
      return assertNever(stage);
  }
}

export function precedence(reason: FailureReason): number {
  return PRECEDENCE[reason];
}

/**
 * Copy of `reasons` ordered from most to least primary.
 */
export function sortByPrecedence(reasons: Iterable<FailureReason>): FailureReason[] {
  return [...reasons].sort((a, b) => PRECEDENCE[a] - PRECEDENCE[b]);
}

/**
 * The dominant cause among several failures, or null if there are none.
 */
export function primaryFailure(
  reasons: Iterable<FailureReason | null | undefined>,
): FailureReason | null {
  let best: FailureReason | null = null;
  for (const reason of reasons) {
    if (!reason) continue;
    if (best === null || PRECEDENCE[reason] < PRECEDENCE[best]) {
      best = reason;
    }
  }
  return best;
}

export function toValidationErrorReason(reason: FailureReason): ValidationErrorReason {
  return VALIDATION_ERROR_REASONS[reason];
}

/** All reasons, most primary first. */
export function reasonsByPrecedence(): FailureReason[] {
  return sortByPrecedence(FAILURE_REASONS);
}

function assertNever(value: never): never {
  throw new UsageError(`Unhandled stage: ${String(value)}`);
}
