/**
 * Causal reasons an attempt can fail, listed in precedence order.
 * When several stages could be blamed, the reason listed first is primary.
 */
export const FAILURE_REASONS = [
  'GIT_CLONE_FAILED',
  'GIT_CHECKOUT_FAILED',
  'SETUP_TIMEOUT',
  'SETUP_FAILED',
  'BASELINE_NOT_FAILING',
  'SANDBOX_ERROR',
  'LLM_ERROR',
  'TOOL_ERROR',
  'TIMEOUT',
  'AGENT_GAVE_UP',
  'TESTS_FAILED',
  'NO_TESTS_COLLECTED',
  'INTERNAL_ERROR',
  'INTERRUPTED',
  'UNKNOWN',
] as const;

export type FailureReason = (typeof FAILURE_REASONS)[number];

/**
 * Execution stages an attempt moves through.
 *
 * - `git_clone` / `git_checkout`: fetching the task repository
 * - `setup`: dependency installation, runs with network access
 * - `baseline_run`: the task's tests before any fix (expected to fail)
 * - `agent_run` / `final_test`: test runs during and after an agent attempt
 */
export const STAGES = [
  'git_clone',
  'git_checkout',
  'setup',
  'baseline_run',
  'agent_run',
  'final_test',
] as const;

export type Stage = (typeof STAGES)[number];

export function isStage(value: unknown): value is Stage {
  return STAGES.some((stage) => stage === value);
}
